// src/models/Pin.ts
import mongoose, { Schema, Types } from "mongoose";
import type { PinStatus } from "../repositories/types";

export interface IPin {
  code: string; // XXXX-XXXX-XXXX
  student?: Types.ObjectId | null;
  term: Types.ObjectId;
  academicSession: Types.ObjectId;
  status: PinStatus;
  usageCount: number;
  payment?: Types.ObjectId | null;
  createdAt: Date;
}

const schema = new Schema<IPin>(
  {
    code: { type: String, required: true, unique: true, uppercase: true, trim: true },
    student: { type: Schema.Types.ObjectId, ref: "User", default: null },
    term: { type: Schema.Types.ObjectId, ref: "Term", required: true },
    academicSession: { type: Schema.Types.ObjectId, ref: "AcademicSession", required: true },
    status: { type: String, enum: ["active", "used"], default: "active" },
    usageCount: { type: Number, default: 0, min: 0 },
    payment: { type: Schema.Types.ObjectId, ref: "Payment", default: null },
  },
  { timestamps: true }
);

schema.index({ student: 1, term: 1 });

export default mongoose.model<IPin>("Pin", schema);
