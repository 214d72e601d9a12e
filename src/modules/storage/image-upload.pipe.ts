import { extname } from "node:path";
import { UTCDate } from "@date-fns/utc";
import { Injectable, PipeTransform } from "@nestjs/common";
import { format } from "date-fns";
import { InvalidUploadException } from "./storage.error";

export const ALLOWED_IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".gif", ".webp"] as const;

export const PROFILE_PICTURE_MAX_BYTES = 5 * 1024 * 1024;
export const VEHICLE_IMAGE_MAX_BYTES = 10 * 1024 * 1024;

export interface UploadedImage {
  buffer: Buffer;
  mimetype: string;
  extension: string;
  size: number;
}

export interface ImageUploadPipeOptions {
  maxSizeBytes: number;
  required?: boolean;
}

/**
 * Validates a multer file: non-empty, an allowed image extension and under
 * the size limit. Optional uploads pass `undefined` through.
 */
@Injectable()
export class ImageUploadPipe
  implements PipeTransform<Express.Multer.File | undefined, UploadedImage | undefined>
{
  constructor(private readonly options: ImageUploadPipeOptions) {}

  transform(file: Express.Multer.File | undefined): UploadedImage | undefined {
    if (!file) {
      if (this.options.required) {
        throw new InvalidUploadException("File is empty");
      }
      return undefined;
    }

    if (file.size === 0) {
      throw new InvalidUploadException("File is empty");
    }

    const extension = extname(file.originalname).toLowerCase();
    if (!ALLOWED_IMAGE_EXTENSIONS.some((allowed) => allowed === extension)) {
      throw new InvalidUploadException(
        `Unsupported file format. Allowed: ${ALLOWED_IMAGE_EXTENSIONS.join(", ")}`,
      );
    }

    if (file.size > this.options.maxSizeBytes) {
      const limitMb = this.options.maxSizeBytes / (1024 * 1024);
      throw new InvalidUploadException(`File size cannot exceed ${limitMb}MB`);
    }

    return {
      buffer: file.buffer,
      mimetype: file.mimetype,
      extension,
      size: file.size,
    };
  }
}

function uploadTimestamp(now: Date): string {
  return format(new UTCDate(now), "yyyyMMddHHmmss");
}

export function buildProfilePictureKey(userId: string, extension: string, now = new Date()): string {
  return `profiles/${userId}_${uploadTimestamp(now)}${extension}`;
}

export function buildVehicleImageKey(carId: number, extension: string, now = new Date()): string {
  return `vehicles/vehicle_${carId}_${uploadTimestamp(now)}${extension}`;
}
