import jsQR from "jsqr";
import { PNG } from "pngjs";
import QRCode from "qrcode";
import { InvalidPayloadError } from "../../errors";
import type { ImageOptions } from "../../schemas/bill";
import { toError } from "../../utils/result";

export interface RenderedImage {
  contentType: string;
  data: Buffer;
}

/** Quiet zone, in modules. */
const MARGIN = 4;

export async function renderQrImage(text: string, options: ImageOptions): Promise<RenderedImage> {
  if (options.format === "svg") {
    const svg = await QRCode.toString(text, {
      type: "svg",
      width: options.size,
      margin: MARGIN,
      errorCorrectionLevel: "M",
    });
    return { contentType: "image/svg+xml", data: Buffer.from(svg, "utf8") };
  }

  const data = await QRCode.toBuffer(text, {
    type: "png",
    width: options.size,
    margin: MARGIN,
    errorCorrectionLevel: "M",
  });
  return { contentType: "image/png", data };
}

/** Decodes the first QR code found in a PNG image and returns its text. */
export function scanQrImage(png: Buffer): string {
  let image: PNG;
  try {
    image = PNG.sync.read(png);
  } catch (error) {
    throw new InvalidPayloadError(`Unreadable PNG image: ${toError(error).message}`);
  }

  const code = jsQR(new Uint8ClampedArray(image.data), image.width, image.height);
  if (code === null) {
    throw new InvalidPayloadError("No QR code found in image");
  }
  return code.data;
}
