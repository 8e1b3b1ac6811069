import { z } from "zod";

import { ALLOWED_LOG_LEVELS } from "../logging/levels.js";

const LogLevelSchema = z.enum(ALLOWED_LOG_LEVELS);

export const ServiceSectionSchema = z
  .object({
    name: z
      .string()
      .trim()
      .min(1)
      .regex(/^[^\\/]+$/, "service name must not contain slashes")
      .optional(),
    display_name: z.string().optional(),
    description: z.string().optional(),
    executable: z.string().optional(),
    arguments: z.array(z.string()).optional(),
    working_dir: z.string().optional(),
    nssm_path: z.string().optional(),
    run_as_user: z.string().optional(),
    run_as_password: z.string().optional(),
    network_resource: z.string().optional(),
    settle_timeout_ms: z.number().int().positive().optional(),
    error_log_lines: z.number().int().positive().max(1000).optional(),
  })
  // The worker may add its own keys here; they load without error.
  .passthrough();

export const LoggingSectionSchema = z
  .object({
    level: LogLevelSchema.optional(),
    file: z.string().optional(),
    console_level: LogLevelSchema.optional(),
  })
  .strict();

// Owned by the worker; only the share path is read here.
const Tc2ProcessorSchema = z
  .object({
    files_directory: z.string().optional(),
  })
  .passthrough();

export const CollectorConfigSchema = z
  .object({
    service: ServiceSectionSchema.optional(),
    logging: LoggingSectionSchema.optional(),
    tc2_processor: Tc2ProcessorSchema.optional(),
  })
  .passthrough();
