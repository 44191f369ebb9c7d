import {
  arrayOf,
  defineRecord,
  mapOf,
  optional,
  type RecordType,
  required,
  string,
  timestamp,
} from "@wirecodec/codec"

export const SnsMessageAttribute = defineRecord("SnsMessageAttribute", {
  type: required("Type", string()),
  value: required("Value", string()),
})

/**
 * `Subject` is `null` when the publisher set none and may be missing
 * entirely on raw deliveries.
 */
export const SnsMessage = defineRecord("SnsMessage", {
  type: required("Type", string()),
  messageId: required("MessageId", string()),
  topicArn: required("TopicArn", string()),
  subject: optional("Subject", string()),
  message: required("Message", string()),
  timestamp: required("Timestamp", timestamp({ encodeAs: "rfc3339-millis" })),
  signatureVersion: required("SignatureVersion", string()),
  signature: required("Signature", string()),
  signingCertUrl: required("SigningCertUrl", string()),
  unsubscribeUrl: required("UnsubscribeUrl", string()),
  messageAttributes: optional("MessageAttributes", mapOf(SnsMessageAttribute.codec)),
})

export const SnsEventRecord = defineRecord("SnsEventRecord", {
  eventVersion: required("EventVersion", string()),
  eventSubscriptionArn: required("EventSubscriptionArn", string()),
  eventSource: required("EventSource", string()),
  sns: required("Sns", SnsMessage.codec),
})

export const SnsEvent = defineRecord("SnsEvent", {
  records: required("Records", arrayOf(SnsEventRecord.codec)),
})

export type SnsEventRecord = RecordType<typeof SnsEventRecord>
export type SnsEvent = RecordType<typeof SnsEvent>
