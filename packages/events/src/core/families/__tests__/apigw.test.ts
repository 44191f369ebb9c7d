import { checkRoundTrip } from "@wirecodec/codec"
import { loadFixture } from "../../../__tests__/load-fixture"
import { forwardedFor } from "../../helpers/forwarded-for"
import { requestBody } from "../../helpers/request-body"
import { ApiGatewayProxyRequest, ApiGatewayProxyResponse } from "../apigw"

const minimal = {
  resource: "/",
  path: "/",
  httpMethod: "GET",
  requestContext: {
    accountId: "123456789012",
    apiId: "api",
    resourcePath: "/",
    stage: "test",
    requestId: "r-1",
    httpMethod: "GET",
    requestTimeEpoch: 0,
    identity: { sourceIp: "192.0.2.1" },
  },
}

describe("ApiGatewayProxyRequest", () => {
  const request = ApiGatewayProxyRequest.decodeOrThrow(loadFixture("apigw-request.get"))

  it("looks headers up case-insensitively", () => {
    expect(request.headers?.first("host")).toBe("api.example.test")
    expect(request.multiValueHeaders?.get("ACCEPT")).toEqual(["application/json"])
  })

  it("decodes the request time from epoch milliseconds", () => {
    expect(request.requestContext.requestTimeEpoch.toISOString()).toBe("2024-03-14T09:26:53.589Z")
  })

  it("keeps null identity attributes and stage variables", () => {
    expect(request.requestContext.identity.caller).toBeNull()
    expect(request.stageVariables).toBeNull()
  })

  it("passes the authorizer context through", () => {
    expect(request.requestContext.authorizer).toEqual({ principalId: "user-42", scope: "orders:read" })
  })

  it("splits X-Forwarded-For", () => {
    expect(forwardedFor(request.headers)).toEqual(["203.0.113.7", "10.0.0.1"])
  })

  it("reads a null body as empty", () => {
    expect(requestBody(request)).toEqual({ ok: true, value: { kind: "empty" } })
  })

  it("decodes a base64 body", () => {
    const binary = ApiGatewayProxyRequest.decodeOrThrow(loadFixture("apigw-request.binary-post"))

    expect(requestBody(binary)).toEqual({
      ok: true,
      value: { kind: "binary", bytes: new TextEncoder().encode("Hello") },
    })
  })

  describe("isBase64Encoded", () => {
    it("defaults to false when absent", () => {
      expect(ApiGatewayProxyRequest.decodeOrThrow(minimal).isBase64Encoded).toBe(false)
    })

    it("defaults to false when null", () => {
      const request = ApiGatewayProxyRequest.decodeOrThrow({ ...minimal, isBase64Encoded: null })

      expect(request.isBase64Encoded).toBe(false)
    })

    it("is written out on encode", () => {
      const report = checkRoundTrip(ApiGatewayProxyRequest, minimal)

      expect(report.ok && report.encoded).toMatchObject({ isBase64Encoded: false })
    })
  })
})

describe("ApiGatewayProxyResponse", () => {
  it("keeps single and multi-value headers in their own shapes", () => {
    const wire = loadFixture("apigw-response.ok")
    const response = ApiGatewayProxyResponse.decodeOrThrow(wire)

    expect(response.statusCode).toBe(200)
    expect(response.multiValueHeaders?.get("set-cookie")).toEqual(["a=1; Path=/", "b=2; Path=/"])
    expect(ApiGatewayProxyResponse.encode(response)).toStrictEqual(wire)
  })

  it("rejects a string status code", () => {
    const result = ApiGatewayProxyResponse.decode({ statusCode: "200" })

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe("ApiGatewayProxyResponse: statusCode: expected int32, got string")
    }
  })
})
