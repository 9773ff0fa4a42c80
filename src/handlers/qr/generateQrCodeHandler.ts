import { formatZodError } from "../../errors";
import { QR_GENERATE } from "../../models/token";
import { BillSchema, ImageOptionsSchema } from "../../schemas/bill";
import {
  BillJsonSchema,
  ErrorStatusJsonSchema,
  IMAGE_OPTION_PARAMETERS,
  IMAGE_RESPONSE_CONTENT,
} from "../../schemas/jsonSchemas";
import { renderQrImage } from "../../services/qr/qrImageService";
import { encodeBill } from "../../services/qr/swissQrBill";
import {
  badRequest,
  binary,
  type HandlerDoc,
  type HandlerResponse,
  type PostRestHandler,
  type RequestContext,
} from "../../routing/handlers";
import { readJsonBody } from "../body";

/**
 * POST /api/public/generate
 * Renders the Swiss QR code for a bill given as JSON.
 */
export class GenerateQrCodeHandler implements PostRestHandler {
  readonly verb = "POST";
  readonly route = "generate";
  readonly requiredPermissions = new Set([QR_GENERATE]);
  readonly doc: HandlerDoc = {
    summary: "Generates a Swiss QR code for the bill in the request body.",
    tags: ["QR"],
    parameters: IMAGE_OPTION_PARAMETERS,
    requestBody: { contentType: "application/json", schema: BillJsonSchema },
    responses: {
      200: { description: "The QR code image", content: IMAGE_RESPONSE_CONTENT },
      400: { description: "Invalid bill", content: [{ contentType: "application/json", schema: ErrorStatusJsonSchema }] },
    },
  };

  async post(ctx: RequestContext): Promise<HandlerResponse> {
    const options = ImageOptionsSchema.safeParse(ctx.query);
    if (!options.success) {
      return badRequest(formatZodError(options.error));
    }

    const body = readJsonBody(ctx);
    if (!body.ok) {
      return badRequest(body.error.message);
    }

    const bill = BillSchema.safeParse(body.value);
    if (!bill.success) {
      return badRequest(formatZodError(bill.error));
    }

    const image = await renderQrImage(encodeBill(bill.data), options.data);
    return binary(image.contentType, image.data);
  }
}
