// src/lib/jwt.ts
import jwt from "jsonwebtoken";
import { Response } from "express";
import { z } from "zod";
import config from "../config/config";
import { ROLES, type Role } from "../repositories/types";

const ONE_DAY_MS = 24 * 60 * 60 * 1000;

const tokenPayload = z.object({
  id: z.string(),
  role: z.enum(ROLES),
  version: z.number().int(),
});

export type TokenPayload = z.infer<typeof tokenPayload>;

export const cookieOptions = {
  httpOnly: true,
  sameSite: "strict" as const,
  secure: process.env.NODE_ENV === "production",
};

export const signToken = (user: { id: string; role: Role; tokenVersion: number }) =>
  jwt.sign({ id: user.id, role: user.role, version: user.tokenVersion }, config.jwtSecret, { expiresIn: "1d" });

// Create JWT and store in HttpOnly cookie
export const setAuthCookie = (res: Response, user: { id: string; role: Role; tokenVersion: number }) => {
  res.cookie("token", signToken(user), { ...cookieOptions, maxAge: ONE_DAY_MS });
};

export const clearAuthCookie = (res: Response) => {
  res.clearCookie("token", cookieOptions);
};

// Throws on a bad signature, expiry or unexpected payload shape
export const verifyToken = (token: string): TokenPayload => tokenPayload.parse(jwt.verify(token, config.jwtSecret));
