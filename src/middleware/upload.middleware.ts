/**
 * File Upload Middleware
 * Handles GPX ride uploads and GeoJSON network uploads using memory storage
 *
 * Files are kept in memory (req.files[i].buffer / req.file.buffer) and
 * decoded straight away; nothing is written to disk.
 *
 * Usage in routes:
 *   router.post("/", uploadGpx.array("gpx", GPX_UPLOAD.MAX_FILES), handleMulterError, handler)
 *   router.post("/import", uploadNetwork.single("network"), handleMulterError, handler)
 */

import multer from "multer";
import path from "path";
import { Request, Response, NextFunction } from "express";
import {
  GPX_UPLOAD,
  NETWORK_IMPORT,
  ERROR_CODES,
  type ErrorCode,
} from "../config/constants.js";

const storage = multer.memoryStorage();

/**
 * Raised by a file filter when an upload has the wrong extension.
 */
export class UploadRejectedError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = "UploadRejectedError";
  }
}

/**
 * File filter accepting only the given extensions (case-insensitive).
 */
function extensionFilter(
  allowed: readonly string[],
  code: ErrorCode
): multer.Options["fileFilter"] {
  return (req, file, cb) => {
    const ext = path.extname(file.originalname).toLowerCase();
    if (!allowed.includes(ext)) {
      cb(new UploadRejectedError(`Only ${allowed.join(", ")} files are allowed`, code));
      return;
    }
    cb(null, true);
  };
}

/**
 * GPX uploads: up to GPX_UPLOAD.MAX_FILES files of at most 10MB each.
 */
export const uploadGpx = multer({
  storage,
  fileFilter: extensionFilter([".gpx"], ERROR_CODES.GPX_INVALID_FORMAT),
  limits: {
    fileSize: GPX_UPLOAD.MAX_FILE_SIZE_BYTES,
    files: GPX_UPLOAD.MAX_FILES,
  },
});

/**
 * Network uploads: a single .geojson / .json file of at most 50MB.
 */
export const uploadNetwork = multer({
  storage,
  fileFilter: extensionFilter(
    NETWORK_IMPORT.ALLOWED_EXTENSIONS,
    ERROR_CODES.NETWORK_PARSE_ERROR
  ),
  limits: {
    fileSize: NETWORK_IMPORT.MAX_FILE_SIZE_BYTES,
    files: 1,
  },
});

// ============================================
// Error Handler Middleware
// ============================================

/**
 * Error handler for upload errors
 *
 * Must be placed AFTER the multer middleware in the route chain.
 *
 * Handles:
 * - LIMIT_FILE_SIZE: file over the size limit for its field
 * - LIMIT_FILE_COUNT / LIMIT_UNEXPECTED_FILE: too many files or wrong field
 * - UploadRejectedError: wrong file extension
 * - Other errors: passed to the next error handler
 */
export function handleMulterError(
  error: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (error instanceof multer.MulterError) {
    if (error.code === "LIMIT_FILE_SIZE") {
      const isNetwork = error.field === "network";
      const limitMb =
        (isNetwork ? NETWORK_IMPORT.MAX_FILE_SIZE_BYTES : GPX_UPLOAD.MAX_FILE_SIZE_BYTES) /
        (1024 * 1024);
      res.status(400).json({
        success: false,
        error: `File too large. Maximum size is ${limitMb}MB.`,
        code: isNetwork ? ERROR_CODES.NETWORK_FILE_TOO_LARGE : ERROR_CODES.GPX_FILE_TOO_LARGE,
      });
      return;
    }

    if (error.code === "LIMIT_FILE_COUNT" || error.code === "LIMIT_UNEXPECTED_FILE") {
      res.status(400).json({
        success: false,
        error: `Upload error: ${error.message}. At most ${GPX_UPLOAD.MAX_FILES} GPX files per request.`,
        code: ERROR_CODES.VALIDATION_ERROR,
      });
      return;
    }

    res.status(400).json({
      success: false,
      error: `Upload error: ${error.message}`,
      code: ERROR_CODES.VALIDATION_ERROR,
    });
    return;
  }

  if (error instanceof UploadRejectedError) {
    res.status(400).json({
      success: false,
      error: error.message,
      code: error.code,
    });
    return;
  }

  next(error);
}
