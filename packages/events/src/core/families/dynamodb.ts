import {
  arrayOf,
  defineRecord,
  integer,
  optional,
  type RecordType,
  required,
  string,
  timestamp,
} from "@wirecodec/codec"
import { attributeMap } from "../attribute-value"

export const DynamoDbUserIdentity = defineRecord("DynamoDbUserIdentity", {
  type: required("type", string()),
  principalId: required("principalId", string()),
})

/**
 * `SequenceNumber` is an opaque ordering token; it is never parsed.
 */
export const DynamoDbStreamRecord = defineRecord("DynamoDbStreamRecord", {
  approximateCreationDateTime: optional(
    "ApproximateCreationDateTime",
    timestamp({ encodeAs: "epoch-seconds" }),
  ),
  keys: required("Keys", attributeMap()),
  newImage: optional("NewImage", attributeMap()),
  oldImage: optional("OldImage", attributeMap()),
  sequenceNumber: required("SequenceNumber", string()),
  sizeBytes: required("SizeBytes", integer("int64")),
  streamViewType: required("StreamViewType", string()),
})

export const DynamoDbEventRecord = defineRecord("DynamoDbEventRecord", {
  eventId: required("eventID", string()),
  eventName: required("eventName", string()),
  eventVersion: required("eventVersion", string()),
  eventSource: required("eventSource", string()),
  awsRegion: required("awsRegion", string()),
  dynamodb: required("dynamodb", DynamoDbStreamRecord.codec),
  eventSourceArn: required("eventSourceARN", string()),
  userIdentity: optional("userIdentity", DynamoDbUserIdentity.codec),
})

export const DynamoDbEvent = defineRecord("DynamoDbEvent", {
  records: required("Records", arrayOf(DynamoDbEventRecord.codec)),
})

export type DynamoDbEventRecord = RecordType<typeof DynamoDbEventRecord>
export type DynamoDbEvent = RecordType<typeof DynamoDbEvent>
