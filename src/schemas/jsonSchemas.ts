/**
 * JSON Schema descriptions published in the OpenAPI document. They mirror
 * the zod schemas in ./bill.
 */

import type { JsonSchema, ParameterDoc } from "../routing/handlers";

export const ErrorStatusJsonSchema: JsonSchema = {
  type: "object",
  required: ["code", "message"],
  properties: {
    code: { type: "integer", example: 401 },
    message: { type: "string", example: "Unauthorized request!" },
  },
};

export const AddressJsonSchema: JsonSchema = {
  type: "object",
  required: ["name", "postalCode", "town", "country"],
  properties: {
    name: { type: "string", maxLength: 70 },
    street: { type: "string", maxLength: 70 },
    buildingNumber: { type: "string", maxLength: 16 },
    postalCode: { type: "string", maxLength: 16 },
    town: { type: "string", maxLength: 35 },
    country: { type: "string", pattern: "^[A-Z]{2}$" },
  },
};

export const BillJsonSchema: JsonSchema = {
  type: "object",
  required: ["account", "creditor"],
  properties: {
    account: { type: "string", description: "CH or LI IBAN; a QR-IBAN for QRR references" },
    creditor: AddressJsonSchema,
    amount: { type: "number", minimum: 0.01, maximum: 999999999.99 },
    currency: { type: "string", enum: ["CHF", "EUR"], default: "CHF" },
    debtor: AddressJsonSchema,
    referenceType: { type: "string", enum: ["QRR", "SCOR", "NON"], default: "NON" },
    reference: { type: "string" },
    unstructuredMessage: { type: "string", maxLength: 140 },
    billInformation: { type: "string", maxLength: 140 },
    alternativeSchemes: { type: "array", maxItems: 2, items: { type: "string", maxLength: 100 } },
  },
};

export const IMAGE_OPTION_PARAMETERS: readonly ParameterDoc[] = [
  {
    name: "format",
    description: "Image format of the generated code",
    schema: { type: "string", enum: ["png", "svg"], default: "png" },
  },
  {
    name: "size",
    description: "Edge length of the image in pixels",
    schema: { type: "integer", minimum: 100, maximum: 2000, default: 500 },
  },
];

export const IMAGE_RESPONSE_CONTENT = [
  { contentType: "image/png", schema: { type: "string", format: "binary" } },
  { contentType: "image/svg+xml", schema: { type: "string" } },
] as const;
