import type { RestHandler } from "../routing/handlers";
import { GenerateQrCodeHandler } from "./qr/generateQrCodeHandler";
import { GenerateQrCodeSimpleHandler } from "./qr/generateQrCodeSimpleHandler";
import { ScanQrCodeHandler } from "./qr/scanQrCodeHandler";

export function defaultHandlers(): RestHandler[] {
  return [new GenerateQrCodeHandler(), new GenerateQrCodeSimpleHandler(), new ScanQrCodeHandler()];
}
