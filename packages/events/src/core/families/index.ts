export * from "./alb"
export * from "./apigw"
export * from "./cloudwatch"
export * from "./dynamodb"
export * from "./s3"
export * from "./sns"
