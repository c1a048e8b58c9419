import { DescriptorFormatError } from "./errors.js";

export const DESCRIPTOR_PARAM = "eddfile";

/** Identifies one file of one purchased download. */
export interface DownloadDescriptor {
  paymentId: number;
  downloadId: number;
  fileKey: string;
}

const ID_PATTERN = /^\d+$/;
const FILE_KEY_PATTERN = /^[A-Za-z0-9_-]+$/;

function assertId(label: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new DescriptorFormatError(`${label} must be a non-negative integer`);
  }
}

function assertFileKey(value: string): void {
  if (!FILE_KEY_PATTERN.test(value)) {
    throw new DescriptorFormatError("fileKey must match ^[A-Za-z0-9_-]+$");
  }
}

export function parseDescriptorId(label: string, raw: string): number {
  if (!ID_PATTERN.test(raw)) {
    throw new DescriptorFormatError(`${label} must be a non-negative integer`);
  }
  const value = Number(raw);
  assertId(label, value);
  return value;
}

/** `paymentId:downloadId:fileKey`; the query serializer escapes the colons. */
export function encodeDescriptor(descriptor: DownloadDescriptor): string {
  assertId("paymentId", descriptor.paymentId);
  assertId("downloadId", descriptor.downloadId);
  assertFileKey(descriptor.fileKey);
  return `${descriptor.paymentId}:${descriptor.downloadId}:${descriptor.fileKey}`;
}

export function decodeDescriptor(value: string): DownloadDescriptor {
  let decoded = value;
  if (value.includes("%")) {
    try {
      decoded = decodeURIComponent(value);
    } catch {
      throw new DescriptorFormatError("Descriptor is not valid percent-encoding");
    }
  }

  const parts = decoded.split(":");
  if (parts.length !== 3) {
    throw new DescriptorFormatError("Descriptor must have exactly three colon-separated parts");
  }
  const [paymentRaw = "", downloadRaw = "", fileKey = ""] = parts;

  const paymentId = parseDescriptorId("paymentId", paymentRaw);
  const downloadId = parseDescriptorId("downloadId", downloadRaw);
  assertFileKey(fileKey);

  return { paymentId, downloadId, fileKey };
}
