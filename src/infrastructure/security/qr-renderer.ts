import QRCode from "qrcode";
import { type AppError, internal } from "../../core/errors/app-error.js";
import type { QrRenderer } from "../../core/ports/totp-service.js";
import { type Result, attempt } from "../../core/types/result.js";

/** PNG data URIs via the `qrcode` package, low error correction */
export const createQrRenderer = (): QrRenderer => ({
  toDataUri(text: string): Promise<Result<string, AppError>> {
    return attempt(
      () => QRCode.toDataURL(text, { errorCorrectionLevel: "L", type: "image/png", margin: 2 }),
      (e) => internal("Failed to render QR code", e),
    );
  },
});
