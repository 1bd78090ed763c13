// src/models/Subject.ts
import mongoose, { Schema } from "mongoose";

export interface ISubject {
  name: string;
  code: string;
  isElective: boolean;
}

const schema = new Schema<ISubject>({
  name: { type: String, required: true, trim: true },
  code: { type: String, required: true, unique: true, uppercase: true, trim: true },
  isElective: { type: Boolean, default: false },
});

export default mongoose.model<ISubject>("Subject", schema);
