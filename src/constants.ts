// src/constants.ts
export const CLI_NAME = "imgledger";

export const DEFAULT_DB_FILE = "image_ledger.db";
export const DEFAULT_CONFIG_FILE = "imgledger.json";
export const DEFAULT_BATCH_SIZE = 100;

export const DEFAULT_EXTENSIONS = [".png", ".jpg", ".jpeg", ".bmp", ".gif"];

// exifr tag names
export const DEFAULT_METADATA_FIELDS = [
  "Make",
  "Model",
  "DateTimeOriginal",
  "ImageWidth",
  "ImageHeight",
  "ExposureTime",
  "FNumber",
];

export const ENV_PREFIX = "IMGLEDGER_";
