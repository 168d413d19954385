import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ValidationError } from '@billmirror/domain-kernel';
import { PlanCatalog } from '@billmirror/billing-domain';
import { z } from 'zod';

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined ? fallback : value.toLowerCase() === 'true'));

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  STRIPE_SECRET_KEY: z.string().min(1),
  PORT: z.coerce.number().int().positive().default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  SEND_EMAIL_RECEIPTS: flag(true),
  DISABLE_SCHEDULER: flag(false),
  PLANS_FILE: z.string().default('config/plans.json'),
  SMTP_HOST: z.string().optional(),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_SECURE: flag(false),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  RECEIPT_FROM: z.string().default('billing@localhost'),
});

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  pass?: string;
  from: string;
}

export interface Config {
  databaseUrl: string;
  redisUrl: string;
  stripeSecretKey: string;
  port: number;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  sendEmailReceipts: boolean;
  disableScheduler: boolean;
  plansFile: string;
  /** Absent when SMTP_HOST is unset; receipts are then only logged. */
  smtp: SmtpSettings | null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError('Invalid environment', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  const e = parsed.data;

  return {
    databaseUrl: e.DATABASE_URL,
    redisUrl: e.REDIS_URL,
    stripeSecretKey: e.STRIPE_SECRET_KEY,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    sendEmailReceipts: e.SEND_EMAIL_RECEIPTS,
    disableScheduler: e.DISABLE_SCHEDULER,
    plansFile: e.PLANS_FILE,
    smtp: e.SMTP_HOST
      ? {
          host: e.SMTP_HOST,
          port: e.SMTP_PORT,
          secure: e.SMTP_SECURE,
          user: e.SMTP_USER,
          pass: e.SMTP_PASS,
          from: e.RECEIPT_FROM,
        }
      : null,
  };
}

/** Reads the plan catalog JSON; relative paths resolve against the working directory. */
export function loadPlanCatalog(path: string): PlanCatalog {
  const raw = readFileSync(resolve(path), 'utf8');
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Plan catalog ${path} is not valid JSON`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return PlanCatalog.fromData(data);
}
