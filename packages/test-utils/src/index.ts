export const PACKAGE_NAME = "@stockroom/test-utils" as const;

export { createTempDir, removeTempDir, writeFiles } from "./fs.js";
export { type LogRecord, type RecordedLevel, RecordingLogger } from "./logger.js";
