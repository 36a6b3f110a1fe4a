export {
  TIMESTAMP_PATTERN,
  HardwareInfoSchema,
  TelemetrySampleSchema,
  CleanedRecordSchema,
  RISK_LEVELS,
  AUTH_METHODS,
  FingerprintCheckSchema,
  IngestResponseSchema,
  type HardwareInfo,
  type TelemetrySample,
  type CleanedRecord,
  type RiskLevel,
  type FingerprintCheck,
  type AuthMethod,
  type IngestResponseBody,
} from "./schema.js";
export { formatTimestamp, flattenSample, SAMPLE_COLUMNS, type FlatSampleRow } from "./format.js";
