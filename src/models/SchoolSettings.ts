// src/models/SchoolSettings.ts
import mongoose, { Schema } from "mongoose";

export interface ISchoolSettings {
  key: "default";
  gradingPreset?: string | null;
  gradingScale: Array<{ min: number; grade: string; remark: string }>;
}

const schema = new Schema<ISchoolSettings>(
  {
    key: { type: String, enum: ["default"], default: "default", unique: true },
    gradingPreset: { type: String, default: null },
    gradingScale: [
      {
        _id: false,
        min: { type: Number, required: true, min: 0, max: 100 },
        grade: { type: String, required: true },
        remark: { type: String, default: "" },
      },
    ],
  },
  { timestamps: true }
);

export default mongoose.model<ISchoolSettings>("SchoolSettings", schema);
