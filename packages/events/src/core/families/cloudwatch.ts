import {
  arrayOf,
  defineRecord,
  json,
  type RecordType,
  required,
  string,
  timestamp,
} from "@wirecodec/codec"

/**
 * Scheduled or bus event. `detail` is kept as the producer sent it.
 */
export const CloudWatchEvent = defineRecord("CloudWatchEvent", {
  version: required("version", string()),
  id: required("id", string()),
  detailType: required("detail-type", string()),
  source: required("source", string()),
  account: required("account", string()),
  time: required("time", timestamp({ encodeAs: "rfc3339" })),
  region: required("region", string()),
  resources: required("resources", arrayOf(string())),
  detail: required("detail", json()),
})

export type CloudWatchEvent = RecordType<typeof CloudWatchEvent>
