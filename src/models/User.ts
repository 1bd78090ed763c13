// src/models/User.ts
import mongoose, { Schema, Types } from "mongoose";
import { ROLES, type Role, type UserStatus } from "../repositories/types";

export interface IUser {
  username: string;
  name: string;
  email?: string | null;
  password: string;
  role: Role;
  status: UserStatus;
  tokenVersion: number;
  // Student profile
  admissionNumber?: string | null;
  schoolClass?: Types.ObjectId | null;
}

const userSchema = new Schema<IUser>(
  {
    username: { type: String, required: true, unique: true, lowercase: true, trim: true },
    name: { type: String, required: true, trim: true },
    email: { type: String, lowercase: true, trim: true, default: null },
    password: { type: String, required: true },
    role: { type: String, enum: [...ROLES], default: "student", required: true },
    status: { type: String, enum: ["active", "suspended"], default: "active" },
    tokenVersion: { type: Number, default: 0, required: true },
    admissionNumber: { type: String, uppercase: true, trim: true, default: null },
    schoolClass: { type: Schema.Types.ObjectId, ref: "SchoolClass", default: null },
  },
  { timestamps: true }
);

userSchema.index({ email: 1 }, { sparse: true });
userSchema.index({ admissionNumber: 1 }, { unique: true, partialFilterExpression: { admissionNumber: { $type: "string" } } });
userSchema.index({ role: 1, schoolClass: 1 });

const User = mongoose.model<IUser>("User", userSchema);

export default User;
