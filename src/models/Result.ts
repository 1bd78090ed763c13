// src/models/Result.ts
import mongoose, { Schema, Types } from "mongoose";
import { CA_MAX, EXAM_MAX } from "../utils/gradingCore";

export interface IResult {
  student: Types.ObjectId;
  subject: Types.ObjectId;
  term: Types.ObjectId;
  schoolClass: Types.ObjectId; // cohort the marks were recorded under

  ca1: number;
  ca2: number;
  ca3: number;
  ca4: number;
  exam: number;

  // Derived on every save
  total: number;
  grade: string;
  remark: string;

  recordedBy?: Types.ObjectId | null;
  updatedAt: Date;
}

const schema = new Schema<IResult>(
  {
    student: { type: Schema.Types.ObjectId, ref: "User", required: true },
    subject: { type: Schema.Types.ObjectId, ref: "Subject", required: true },
    term: { type: Schema.Types.ObjectId, ref: "Term", required: true },
    schoolClass: { type: Schema.Types.ObjectId, ref: "SchoolClass", required: true },

    ca1: { type: Number, min: 0, max: CA_MAX, required: true },
    ca2: { type: Number, min: 0, max: CA_MAX, required: true },
    ca3: { type: Number, min: 0, max: CA_MAX, required: true },
    ca4: { type: Number, min: 0, max: CA_MAX, required: true },
    exam: { type: Number, min: 0, max: EXAM_MAX, required: true },

    total: { type: Number, min: 0, max: 100, required: true },
    grade: { type: String, required: true },
    remark: { type: String, required: true },

    recordedBy: { type: Schema.Types.ObjectId, ref: "User", default: null },
  },
  { timestamps: true }
);

// One row per student, subject and term
schema.index({ student: 1, subject: 1, term: 1 }, { unique: true });
schema.index({ term: 1, schoolClass: 1 });

export default mongoose.model<IResult>("Result", schema);
