import type { RecordDefinition } from "@wirecodec/codec"
import { AlbTargetGroupRequest, AlbTargetGroupResponse } from "./families/alb"
import { ApiGatewayProxyRequest, ApiGatewayProxyResponse } from "./families/apigw"
import { CloudWatchEvent } from "./families/cloudwatch"
import { DynamoDbEvent } from "./families/dynamodb"
import { S3Event } from "./families/s3"
import { SnsEvent } from "./families/sns"

/**
 * Top-level record definition of every supported event family, by the name
 * used in sample file names (`<family>.<sample>.json`).
 */
export const eventFamilies = Object.freeze({
  s3: S3Event,
  sns: SnsEvent,
  "apigw-request": ApiGatewayProxyRequest,
  "apigw-response": ApiGatewayProxyResponse,
  "alb-request": AlbTargetGroupRequest,
  "alb-response": AlbTargetGroupResponse,
  dynamodb: DynamoDbEvent,
  cloudwatch: CloudWatchEvent,
})

export type EventFamily = keyof typeof eventFamilies

export const eventFamilyNames: readonly EventFamily[] = Object.freeze([
  "s3",
  "sns",
  "apigw-request",
  "apigw-response",
  "alb-request",
  "alb-response",
  "dynamodb",
  "cloudwatch",
])

export function isEventFamily(name: string): name is EventFamily {
  return Object.hasOwn(eventFamilies, name)
}

export function familyDefinition(family: EventFamily): RecordDefinition<object> {
  return eventFamilies[family]
}
