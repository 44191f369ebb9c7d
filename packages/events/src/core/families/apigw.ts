import {
  arrayOf,
  boolean,
  defaulted,
  defineRecord,
  integer,
  json,
  mapOf,
  multiMap,
  optional,
  type RecordType,
  required,
  string,
  timestamp,
} from "@wirecodec/codec"

/**
 * Caller identity. Every attribute except `sourceIp` is `null` for
 * unauthenticated calls.
 */
export const ApiGatewayRequestIdentity = defineRecord("ApiGatewayRequestIdentity", {
  sourceIp: required("sourceIp", string()),
  userAgent: optional("userAgent", string()),
  accountId: optional("accountId", string()),
  apiKey: optional("apiKey", string()),
  caller: optional("caller", string()),
  user: optional("user", string()),
  userArn: optional("userArn", string()),
  accessKey: optional("accessKey", string()),
  cognitoIdentityId: optional("cognitoIdentityId", string()),
  cognitoIdentityPoolId: optional("cognitoIdentityPoolId", string()),
  cognitoAuthenticationType: optional("cognitoAuthenticationType", string()),
  cognitoAuthenticationProvider: optional("cognitoAuthenticationProvider", string()),
})

export const ApiGatewayRequestContext = defineRecord("ApiGatewayRequestContext", {
  accountId: required("accountId", string()),
  apiId: required("apiId", string()),
  resourceId: optional("resourceId", string()),
  resourcePath: required("resourcePath", string()),
  stage: required("stage", string()),
  requestId: required("requestId", string()),
  extendedRequestId: optional("extendedRequestId", string()),
  httpMethod: required("httpMethod", string()),
  path: optional("path", string()),
  protocol: optional("protocol", string()),
  domainName: optional("domainName", string()),
  requestTime: optional("requestTime", string()),
  requestTimeEpoch: required("requestTimeEpoch", timestamp({ encodeAs: "epoch-millis" })),
  identity: required("identity", ApiGatewayRequestIdentity.codec),
  authorizer: optional("authorizer", json()),
})

/**
 * REST API proxy integration request. Header and parameter maps are `null`
 * when the request carried none.
 */
export const ApiGatewayProxyRequest = defineRecord("ApiGatewayProxyRequest", {
  resource: required("resource", string()),
  path: required("path", string()),
  httpMethod: required("httpMethod", string()),
  headers: optional("headers", multiMap()),
  multiValueHeaders: optional("multiValueHeaders", multiMap()),
  queryStringParameters: optional("queryStringParameters", mapOf(string())),
  multiValueQueryStringParameters: optional(
    "multiValueQueryStringParameters",
    mapOf(arrayOf(string())),
  ),
  pathParameters: optional("pathParameters", mapOf(string())),
  stageVariables: optional("stageVariables", mapOf(string())),
  requestContext: required("requestContext", ApiGatewayRequestContext.codec),
  body: optional("body", string()),
  isBase64Encoded: defaulted("isBase64Encoded", boolean(), false, { nullIsDefault: true }),
})

export const ApiGatewayProxyResponse = defineRecord("ApiGatewayProxyResponse", {
  statusCode: required("statusCode", integer("int32")),
  headers: optional("headers", multiMap()),
  multiValueHeaders: optional("multiValueHeaders", multiMap()),
  body: optional("body", string()),
  isBase64Encoded: optional("isBase64Encoded", boolean()),
})

export type ApiGatewayProxyRequest = RecordType<typeof ApiGatewayProxyRequest>
export type ApiGatewayProxyResponse = RecordType<typeof ApiGatewayProxyResponse>
