export { RecordParser, classifyRecord, isKeyValueMap } from "./parser";
export { encodeRecord, readFrames, DEFAULT_MAX_RECORD_SIZE } from "./framing";
export { writeRecords } from "./writer";
export type { MalformedRecord, RecordParserOptions, SampleRecord, StructuredRecord } from "./types";
