// src/models/Attendance.ts
import mongoose, { Schema, Types } from "mongoose";
import type { AttendanceStatus } from "../repositories/types";

export interface IAttendance {
  student: Types.ObjectId;
  schoolClass: Types.ObjectId;
  term: Types.ObjectId;
  date: string; // YYYY-MM-DD
  status: AttendanceStatus;
  recordedBy: Types.ObjectId;
}

const schema = new Schema<IAttendance>(
  {
    student: { type: Schema.Types.ObjectId, ref: "User", required: true },
    schoolClass: { type: Schema.Types.ObjectId, ref: "SchoolClass", required: true },
    term: { type: Schema.Types.ObjectId, ref: "Term", required: true },
    date: { type: String, required: true, trim: true },
    status: { type: String, enum: ["present", "absent", "late"], required: true },
    recordedBy: { type: Schema.Types.ObjectId, ref: "User", required: true },
  },
  { timestamps: true }
);

schema.index({ student: 1, date: 1 }, { unique: true });
schema.index({ schoolClass: 1, date: 1 });
schema.index({ student: 1, term: 1 });

export default mongoose.model<IAttendance>("Attendance", schema);
