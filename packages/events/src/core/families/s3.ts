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

const eventTime = timestamp({ encodeAs: "rfc3339-millis" })

export const S3UserIdentity = defineRecord("S3UserIdentity", {
  principalId: required("principalId", string()),
})

export const S3RequestParameters = defineRecord("S3RequestParameters", {
  sourceIpAddress: required("sourceIPAddress", string()),
})

export const S3ResponseElements = defineRecord("S3ResponseElements", {
  requestId: required("x-amz-request-id", string()),
  hostId: required("x-amz-id-2", string()),
})

export const S3Bucket = defineRecord("S3Bucket", {
  name: required("name", string()),
  ownerIdentity: required("ownerIdentity", S3UserIdentity.codec),
  arn: required("arn", string()),
})

/**
 * `size` is absent on delete events; `versionId` only appears on versioned
 * buckets.
 */
export const S3Object = defineRecord("S3Object", {
  key: required("key", string()),
  size: optional("size", integer("int64")),
  eTag: optional("eTag", string()),
  versionId: optional("versionId", string()),
  sequencer: optional("sequencer", string()),
})

export const S3Entity = defineRecord("S3Entity", {
  schemaVersion: required("s3SchemaVersion", string()),
  configurationId: required("configurationId", string()),
  bucket: required("bucket", S3Bucket.codec),
  object: required("object", S3Object.codec),
})

export const S3RestoreEventData = defineRecord("S3RestoreEventData", {
  lifecycleRestorationExpiryTime: required("lifecycleRestorationExpiryTime", eventTime),
  lifecycleRestoreStorageClass: required("lifecycleRestoreStorageClass", string()),
})

export const S3GlacierEventData = defineRecord("S3GlacierEventData", {
  restoreEventData: required("restoreEventData", S3RestoreEventData.codec),
})

export const S3IntelligentTieringEventData = defineRecord("S3IntelligentTieringEventData", {
  destinationAccessTier: required("destinationAccessTier", string()),
})

export const S3TransitionEventData = defineRecord("S3TransitionEventData", {
  destinationStorageClass: required("destinationStorageClass", string()),
})

export const S3LifecycleEventData = defineRecord("S3LifecycleEventData", {
  transitionEventData: required("transitionEventData", S3TransitionEventData.codec),
})

/**
 * One notification. Event versions 2.1 to 2.3 share this table; the
 * `*EventData` blocks only appear on the 2.3 events that carry them.
 */
export const S3EventRecord = defineRecord("S3EventRecord", {
  eventVersion: required("eventVersion", string()),
  eventSource: required("eventSource", string()),
  awsRegion: required("awsRegion", string()),
  eventTime: required("eventTime", eventTime),
  eventName: required("eventName", string()),
  userIdentity: required("userIdentity", S3UserIdentity.codec),
  requestParameters: required("requestParameters", S3RequestParameters.codec),
  responseElements: required("responseElements", S3ResponseElements.codec),
  s3: required("s3", S3Entity.codec),
  glacierEventData: optional("glacierEventData", S3GlacierEventData.codec),
  intelligentTieringEventData: optional(
    "intelligentTieringEventData",
    S3IntelligentTieringEventData.codec,
  ),
  lifecycleEventData: optional("lifecycleEventData", S3LifecycleEventData.codec),
})

export const S3Event = defineRecord("S3Event", {
  records: required("Records", arrayOf(S3EventRecord.codec)),
})

export type S3EventRecord = RecordType<typeof S3EventRecord>
export type S3Event = RecordType<typeof S3Event>
