// src/config/config.ts
import dotenv from "dotenv";

dotenv.config();

const config = Object.freeze({
  port: Number(process.env.PORT) || 8000,
  databaseURI: process.env.MONGODB_URI || "mongodb://localhost:27017/school-portal",
  frontendUrl: process.env.FRONTEND_URL || "http://localhost:3000",
  jwtSecret: process.env.JWT_SECRET || "please-change-me",
  appName: process.env.APP_NAME || "Results Portal",
  // "four-band" | "six-band"; a custom scale saved in settings wins over this
  gradingScale: process.env.GRADING_SCALE || "four-band",
  pinPrice: Number(process.env.PIN_PRICE) || 1000,
  paymentGateway: Object.freeze({
    baseUrl: process.env.PAYMENT_GATEWAY_URL || "",
    secretKey: process.env.PAYMENT_GATEWAY_SECRET || "",
    timeoutMs: Number(process.env.PAYMENT_GATEWAY_TIMEOUT_MS) || 10000,
    retries: Number(process.env.PAYMENT_GATEWAY_RETRIES ?? 2),
  }),
  defaultAdmin: Object.freeze({
    username: process.env.ADMIN_USERNAME || "admin",
    password: process.env.ADMIN_PASSWORD || "",
    name: process.env.ADMIN_NAME || "School Administrator",
  }),
});

export default config;
