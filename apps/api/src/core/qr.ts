import QRCode from 'qrcode';
import { z } from 'zod';
import { AppError } from './errors/AppError';

// Nivel L, caja 10, borde 4
const QR_OPTIONS = {
  errorCorrectionLevel: 'L',
  scale: 10,
  margin: 4
} as const;

export const MAX_QR_URL_LENGTH = 2048;

const qrUrlSchema = z
  .string()
  .trim()
  .min(1, 'URL is required')
  .max(MAX_QR_URL_LENGTH, `URL too long (max ${MAX_QR_URL_LENGTH} chars)`)
  .url('Must be an absolute URL')
  .refine((v) => /^https?:\/\//i.test(v), {
    message: 'Only http and https URLs can be encoded'
  });

export class InvalidQrInputError extends AppError {
  constructor(details: unknown) {
    super(400, 'Invalid QR input', details);
    this.name = 'InvalidQrInputError';
  }
}

function validUrl(url: string) {
  const parsed = qrUrlSchema.safeParse(url);

  if (!parsed.success) {
    throw new InvalidQrInputError(parsed.error.flatten());
  }

  return parsed.data;
}

/** PNG del QR. Misma URL => mismos bytes. */
export async function encode(url: string): Promise<Buffer> {
  return QRCode.toBuffer(validUrl(url), { ...QR_OPTIONS, type: 'png' });
}

export async function encodeSvg(url: string): Promise<string> {
  return QRCode.toString(validUrl(url), { ...QR_OPTIONS, type: 'svg' });
}

export async function encodeDataUrl(url: string): Promise<string> {
  return QRCode.toDataURL(validUrl(url), { ...QR_OPTIONS, type: 'image/png' });
}
