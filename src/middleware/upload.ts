// src/middleware/upload.ts
import multer from "multer";
import path from "path";
import { ValidationError } from "../lib/errors";

const storage = multer.memoryStorage();

export const uploadMarksFile = multer({
  storage,
  limits: { fileSize: 5 * 1024 * 1024 }, // 5MB
  fileFilter: (req, file, cb) => {
    const ext = path.extname(file.originalname).toLowerCase();
    if (ext !== ".csv") {
      return cb(new ValidationError("Only CSV files allowed"));
    }
    cb(null, true);
  },
});
