import { tmpdir } from 'node:os';
import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PDFTOPPM_PATH: z.string().min(1).default('pdftoppm'),
  SCRATCH_ROOT: z.string().min(1).optional(),
  ARCHIVE_FILENAME: z.string().min(1).default('pdf_images.zip'),
  ERROR_DETAILS_HINT: z.string().min(1).default('Check CloudWatch logs for more information'),
  PORT: positiveInt(3000),

  LAMBDA_FUNCTION_NAME: z.string().min(1).default('pdf-to-jpg-converter'),
  ECR_REPOSITORY_NAME: z.string().min(1).default('pdf-to-jpg-converter'),
  LAMBDA_ROLE_NAME: z.string().min(1).default('lambda-execution-role'),
  AWS_REGION: z.string().min(1).default('eu-west-2'),
  LAMBDA_TIMEOUT: positiveInt(30),
  LAMBDA_MEMORY_SIZE: positiveInt(1024),
  LOG_RETENTION_DAYS: positiveInt(7),
});

export interface DeployConfig {
  functionName: string;
  repositoryName: string;
  roleName: string;
  region: string;
  timeoutSeconds: number;
  memorySizeMb: number;
  logRetentionDays: number;
}

export interface AppConfig {
  pdftoppmPath: string;
  scratchRoot: string;
  archiveFilename: string;
  errorDetailsHint: string;
  port: number;
  deploy: DeployConfig;
}

/** @throws {Error} If any variable fails validation */
export function loadConfig(env: Record<string, string | undefined> = process.env): Readonly<AppConfig> {
  // Blank variables fall back to their defaults, the way an unset one would.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  return Object.freeze({
    pdftoppmPath: vars.PDFTOPPM_PATH,
    scratchRoot: vars.SCRATCH_ROOT ?? tmpdir(),
    archiveFilename: vars.ARCHIVE_FILENAME,
    errorDetailsHint: vars.ERROR_DETAILS_HINT,
    port: vars.PORT,
    deploy: Object.freeze({
      functionName: vars.LAMBDA_FUNCTION_NAME,
      repositoryName: vars.ECR_REPOSITORY_NAME,
      roleName: vars.LAMBDA_ROLE_NAME,
      region: vars.AWS_REGION,
      timeoutSeconds: vars.LAMBDA_TIMEOUT,
      memorySizeMb: vars.LAMBDA_MEMORY_SIZE,
      logRetentionDays: vars.LOG_RETENTION_DAYS,
    }),
  });
}
