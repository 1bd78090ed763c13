// src/models/Term.ts
import mongoose, { Schema, Types } from "mongoose";

export interface ITerm {
  name: string; // e.g. "First Term"
  academicSession: Types.ObjectId;
  isCurrent: boolean;
}

const schema = new Schema<ITerm>(
  {
    name: { type: String, required: true, trim: true },
    academicSession: { type: Schema.Types.ObjectId, ref: "AcademicSession", required: true },
    isCurrent: { type: Boolean, default: false },
  },
  { timestamps: true }
);

schema.index({ academicSession: 1, name: 1 }, { unique: true });
schema.index({ isCurrent: 1 });

export default mongoose.model<ITerm>("Term", schema);
