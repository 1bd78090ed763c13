// src/models/SchoolClass.ts
import mongoose, { Schema } from "mongoose";

export interface ISchoolClass {
  name: string; // e.g. "JSS 1A"
  level?: string | null;
}

const schema = new Schema<ISchoolClass>({
  name: { type: String, required: true, unique: true, trim: true },
  level: { type: String, trim: true, default: null },
});

export default mongoose.model<ISchoolClass>("SchoolClass", schema);
