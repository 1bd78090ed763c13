// src/context.ts
import type { Repositories } from "./repositories/types";
import type { PaymentGateway } from "./services/paymentGateway";
import { CohortCache } from "./services/cohortStats";
import { createAuditLogger, type AuditLogger } from "./lib/auditLogger";

export interface AppContext {
  repos: Repositories;
  gateway: PaymentGateway;
  cohortCache: CohortCache;
  defaultScale: string;
  pinPrice: number;
  logAudit: AuditLogger;
}

export function createContext(
  repos: Repositories,
  gateway: PaymentGateway,
  { defaultScale, pinPrice }: { defaultScale: string; pinPrice: number }
): AppContext {
  return {
    repos,
    gateway,
    cohortCache: new CohortCache(),
    defaultScale,
    pinPrice,
    logAudit: createAuditLogger(repos.auditLogs),
  };
}
