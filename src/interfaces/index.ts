export type { RecordStore } from "./store/recordStore";
export type { Renderer } from "./clients/renderer";
export type { Extractor, ExtractorUsage } from "./clients/extractor";
export type { PlatformAdapter } from "./platforms/platformAdapter";
