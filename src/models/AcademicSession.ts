// src/models/AcademicSession.ts
import mongoose, { Schema } from "mongoose";

export interface IAcademicSession {
  name: string; // e.g. "2024/2025"
  startDate?: Date | null;
  endDate?: Date | null;
  isCurrent: boolean;
}

const schema = new Schema<IAcademicSession>(
  {
    name: { type: String, required: true, unique: true, trim: true },
    startDate: { type: Date, default: null },
    endDate: { type: Date, default: null },
    isCurrent: { type: Boolean, default: false },
  },
  { timestamps: true }
);

schema.index({ isCurrent: 1 });

export default mongoose.model<IAcademicSession>("AcademicSession", schema);
