// src/server.ts
import { buildApp } from "./app";
import connectDB from "./config/db";
import config from "./config/config";
import { ensureDefaultAdmin } from "./config/defaultData";
import { createContext } from "./context";
import { createMongoRepositories } from "./repositories/mongoRepositories";
import { HttpPaymentGateway } from "./services/paymentGateway";

const startServer = async () => {
  try {
    // 1. Connect to MongoDB
    await connectDB();

    const repos = createMongoRepositories();
    await ensureDefaultAdmin(repos.users, config.defaultAdmin);

    const ctx = createContext(repos, new HttpPaymentGateway(config.paymentGateway), {
      defaultScale: config.gradingScale,
      pinPrice: config.pinPrice,
    });

    // 2. Listen
    buildApp(ctx).listen(config.port, () => {
      console.log(`${config.appName} running on http://localhost:${config.port}`);
      console.log(`Frontend: ${config.frontendUrl}`);
      console.log(`Environment: ${process.env.NODE_ENV || "development"}`);
    });
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
};

void startServer();
