// src/models/Payment.ts
import mongoose, { Schema, Types } from "mongoose";
import type { PaymentMethod, PaymentPurpose, PaymentStatus } from "../repositories/types";

export interface IPayment {
  student: Types.ObjectId;
  term: Types.ObjectId;
  academicSession: Types.ObjectId;
  amount: number;
  method: PaymentMethod;
  purpose: PaymentPurpose;
  status: PaymentStatus;
  reference: string;
  pin?: Types.ObjectId | null;
  processedBy?: Types.ObjectId | null;
  processedAt?: Date | null;
  note?: string | null;
  createdAt: Date;
}

const schema = new Schema<IPayment>(
  {
    student: { type: Schema.Types.ObjectId, ref: "User", required: true },
    term: { type: Schema.Types.ObjectId, ref: "Term", required: true },
    academicSession: { type: Schema.Types.ObjectId, ref: "AcademicSession", required: true },
    amount: { type: Number, required: true, min: 0 },
    method: { type: String, enum: ["gateway", "manual"], required: true },
    purpose: { type: String, enum: ["result-pin", "school-fees"], default: "result-pin" },
    status: { type: String, enum: ["pending", "approved", "declined"], default: "pending" },
    reference: { type: String, required: true, unique: true, trim: true },
    pin: { type: Schema.Types.ObjectId, ref: "Pin", default: null },
    processedBy: { type: Schema.Types.ObjectId, ref: "User", default: null },
    processedAt: { type: Date, default: null },
    note: { type: String, default: null },
  },
  { timestamps: true }
);

schema.index({ status: 1, createdAt: -1 });
schema.index({ student: 1, createdAt: -1 });

export default mongoose.model<IPayment>("Payment", schema);
