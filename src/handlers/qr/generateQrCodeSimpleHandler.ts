import { formatZodError } from "../../errors";
import { QR_GENERATE } from "../../models/token";
import { BillSchema, ImageOptionsSchema, SimpleBillQuerySchema, billFromQuery } from "../../schemas/bill";
import { ErrorStatusJsonSchema, IMAGE_OPTION_PARAMETERS, IMAGE_RESPONSE_CONTENT } from "../../schemas/jsonSchemas";
import { renderQrImage } from "../../services/qr/qrImageService";
import { encodeBill } from "../../services/qr/swissQrBill";
import {
  badRequest,
  binary,
  type GetRestHandler,
  type HandlerDoc,
  type HandlerResponse,
  type ParameterDoc,
  type RequestContext,
} from "../../routing/handlers";

const text = { type: "string" } as const;

const BILL_PARAMETERS: readonly ParameterDoc[] = [
  { name: "account", required: true, description: "CH or LI IBAN", schema: text },
  { name: "creditorName", required: true, schema: text },
  { name: "creditorStreet", schema: text },
  { name: "creditorBuildingNumber", schema: text },
  { name: "creditorPostalCode", required: true, schema: text },
  { name: "creditorTown", required: true, schema: text },
  { name: "creditorCountry", schema: { type: "string", default: "CH" } },
  { name: "amount", schema: { type: "number" } },
  { name: "currency", schema: { type: "string", enum: ["CHF", "EUR"], default: "CHF" } },
  { name: "referenceType", schema: { type: "string", enum: ["QRR", "SCOR", "NON"], default: "NON" } },
  { name: "reference", schema: text },
  { name: "message", description: "Unstructured message", schema: text },
];

/**
 * GET /api/public/generate
 * Same as the POST variant, with the bill spelled out in the query string.
 */
export class GenerateQrCodeSimpleHandler implements GetRestHandler {
  readonly verb = "GET";
  readonly route = "generate";
  readonly requiredPermissions = new Set([QR_GENERATE]);
  readonly doc: HandlerDoc = {
    summary: "Generates a Swiss QR code for a bill given as query parameters.",
    tags: ["QR"],
    parameters: [...BILL_PARAMETERS, ...IMAGE_OPTION_PARAMETERS],
    responses: {
      200: { description: "The QR code image", content: IMAGE_RESPONSE_CONTENT },
      400: { description: "Invalid bill", content: [{ contentType: "application/json", schema: ErrorStatusJsonSchema }] },
    },
  };

  async get(ctx: RequestContext): Promise<HandlerResponse> {
    const options = ImageOptionsSchema.safeParse(ctx.query);
    if (!options.success) {
      return badRequest(formatZodError(options.error));
    }

    const query = SimpleBillQuerySchema.safeParse(ctx.query);
    if (!query.success) {
      return badRequest(formatZodError(query.error));
    }

    const bill = BillSchema.safeParse(billFromQuery(query.data));
    if (!bill.success) {
      return badRequest(formatZodError(bill.error));
    }

    const image = await renderQrImage(encodeBill(bill.data), options.data);
    return binary(image.contentType, image.data);
  }
}
