import { defaulted, optional, required } from "../../fields/field-builders"
import { arrayOf } from "../../primitives/array-of"
import { boolean } from "../../primitives/boolean"
import { multiMap } from "../../primitives/multi-map"
import { integer } from "../../primitives/numeric"
import { string } from "../../primitives/string"
import { timestamp } from "../../primitives/timestamp"
import { defineRecord } from "../define-record"

export const Part = defineRecord("Part", {
  sku: required("sku", string()),
  quantity: defaulted("qty", integer("int32"), 1),
})

export const Order = defineRecord("Order", {
  id: required("id", string()),
  placedAt: required("placedAt", timestamp({ encodeAs: "rfc3339-millis" })),
  note: optional("note", string()),
  gift: defaulted("gift", boolean(), false, { nullIsDefault: true }),
  headers: optional("headers", multiMap()),
  parts: required("parts", arrayOf(Part.codec)),
})
