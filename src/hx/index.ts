export {
  buildChunks,
  writeChunks,
  assertAsciiPlan,
  renderChunk,
  chunk,
  chunkFileName,
  isChunkFileName,
  HX_INDICATOR_TYPES,
  DEFAULT_MAX_CHUNK_SIZE,
} from './chunk-exporter.js';
