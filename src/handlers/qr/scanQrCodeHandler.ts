import { InvalidPayloadError } from "../../errors";
import { QR_SCAN } from "../../models/token";
import { BillJsonSchema, ErrorStatusJsonSchema } from "../../schemas/jsonSchemas";
import { scanQrImage } from "../../services/qr/qrImageService";
import { decodeBill } from "../../services/qr/swissQrBill";
import {
  badRequest,
  json,
  type HandlerDoc,
  type HandlerResponse,
  type PostRestHandler,
  type RequestContext,
} from "../../routing/handlers";

/**
 * POST /api/public/scan
 * Reads a PNG upload, finds the QR code in it and decodes the bill.
 */
export class ScanQrCodeHandler implements PostRestHandler {
  readonly verb = "POST";
  readonly route = "scan";
  readonly requiredPermissions = new Set([QR_SCAN]);
  readonly doc: HandlerDoc = {
    summary: "Scans a Swiss QR code image and returns the decoded bill.",
    tags: ["QR"],
    requestBody: { contentType: "image/png", schema: { type: "string", format: "binary" } },
    responses: {
      200: { description: "The decoded bill", content: [{ contentType: "application/json", schema: BillJsonSchema }] },
      400: {
        description: "Not a PNG image or no Swiss QR code found",
        content: [{ contentType: "application/json", schema: ErrorStatusJsonSchema }],
      },
    },
  };

  async post(ctx: RequestContext): Promise<HandlerResponse> {
    if (ctx.contentType === undefined || !ctx.contentType.toLowerCase().startsWith("image/png")) {
      return badRequest("Expected an image/png upload");
    }
    if (ctx.body.length === 0) {
      return badRequest("Image upload is empty");
    }

    try {
      return json(decodeBill(scanQrImage(ctx.body)));
    } catch (error) {
      if (error instanceof InvalidPayloadError) {
        return badRequest(error.message);
      }
      throw error;
    }
  }
}
