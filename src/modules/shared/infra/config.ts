import { z } from "zod";

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

// Largest delay a Node timer honours; longer ones fire after 1 ms.
const MAX_TIMER_MS = 2_147_483_647;

const EnvSchema = z
  .object({
    NODE_ENV: z.string().default("development"),
    DATABASE_URL: z.string().min(1),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
    PAYMENT_GATEWAY_URL: z.url(),
    PAYMENT_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .positive()
      .max(MAX_TIMER_MS, "PAYMENT_TIMEOUT_MS must fit a timer")
      .default(10_000),
    RECORD_CANCELLED_ORDERS: z.stringbool().default(true),
    RESERVATION_STALE_AFTER_MS: z.coerce
      .number()
      .int()
      .positive()
      .default(120_000),
    SWEEP_INTERVAL_MS: z.coerce
      .number()
      .int()
      .positive()
      .max(MAX_TIMER_MS, "SWEEP_INTERVAL_MS must fit a timer")
      .default(30_000),
  })
  .refine((env) => env.RESERVATION_STALE_AFTER_MS > env.PAYMENT_TIMEOUT_MS, {
    message: "RESERVATION_STALE_AFTER_MS must exceed PAYMENT_TIMEOUT_MS",
    path: ["RESERVATION_STALE_AFTER_MS"],
  });

export type AppConfig = {
  isProduction: boolean;
  databaseUrl: string;
  port: number;
  logLevel: (typeof LOG_LEVELS)[number];
  paymentGatewayUrl: string;
  paymentTimeoutMs: number;
  recordCancelledOrders: boolean;
  reservationStaleAfterMs: number;
  sweepIntervalMs: number;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration:\n${z.prettifyError(result.error)}`,
    );
  }
  const parsed = result.data;
  const isProduction = parsed.NODE_ENV === "production";
  return {
    isProduction,
    databaseUrl: parsed.DATABASE_URL,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL ?? (isProduction ? "info" : "debug"),
    paymentGatewayUrl: parsed.PAYMENT_GATEWAY_URL,
    paymentTimeoutMs: parsed.PAYMENT_TIMEOUT_MS,
    recordCancelledOrders: parsed.RECORD_CANCELLED_ORDERS,
    reservationStaleAfterMs: parsed.RESERVATION_STALE_AFTER_MS,
    sweepIntervalMs: parsed.SWEEP_INTERVAL_MS,
  };
}
