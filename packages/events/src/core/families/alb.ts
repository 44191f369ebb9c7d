import {
  arrayOf,
  boolean,
  defaulted,
  defineRecord,
  integer,
  mapOf,
  multiMap,
  optional,
  type RecordType,
  required,
  string,
} from "@wirecodec/codec"

export const AlbElbContext = defineRecord("AlbElbContext", {
  targetGroupArn: required("targetGroupArn", string()),
})

export const AlbRequestContext = defineRecord("AlbRequestContext", {
  elb: required("elb", AlbElbContext.codec),
})

/**
 * Target-group request. Only one of `headers` / `multiValueHeaders` (and of
 * the two query maps) is present, depending on the target group setting.
 */
export const AlbTargetGroupRequest = defineRecord("AlbTargetGroupRequest", {
  requestContext: required("requestContext", AlbRequestContext.codec),
  httpMethod: required("httpMethod", string()),
  path: required("path", string()),
  queryStringParameters: optional("queryStringParameters", mapOf(string())),
  multiValueQueryStringParameters: optional(
    "multiValueQueryStringParameters",
    mapOf(arrayOf(string())),
  ),
  headers: optional("headers", multiMap()),
  multiValueHeaders: optional("multiValueHeaders", multiMap()),
  body: optional("body", string()),
  isBase64Encoded: defaulted("isBase64Encoded", boolean(), false, { nullIsDefault: true }),
})

export const AlbTargetGroupResponse = defineRecord("AlbTargetGroupResponse", {
  statusCode: required("statusCode", integer("int32")),
  statusDescription: optional("statusDescription", string()),
  headers: optional("headers", multiMap()),
  multiValueHeaders: optional("multiValueHeaders", multiMap()),
  body: optional("body", string()),
  isBase64Encoded: optional("isBase64Encoded", boolean()),
})

export type AlbTargetGroupRequest = RecordType<typeof AlbTargetGroupRequest>
export type AlbTargetGroupResponse = RecordType<typeof AlbTargetGroupResponse>
