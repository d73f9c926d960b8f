/**
 * Pipeline module exports
 */

export { chunkText, chunkId, emitRecord, recordToChunks } from "./emitter.js";
export { parseLine, processJsonl, formatSummary } from "./driver.js";
