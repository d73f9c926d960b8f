/**
 * MCP Tools module exports
 */

export { normalizeTextTool } from "./normalize-text.js";
export { chunkRecord } from "./chunk-record.js";
export { prepareJsonl } from "./prepare-jsonl.js";
