import type { z } from "zod";

import type {
  CollectorConfigSchema,
  LoggingSectionSchema,
  ServiceSectionSchema,
} from "./zod-schema.js";

export type CollectorConfig = z.infer<typeof CollectorConfigSchema>;
export type ServiceSection = z.infer<typeof ServiceSectionSchema>;
export type LoggingSection = z.infer<typeof LoggingSectionSchema>;

export type ConfigValidationIssue = {
  path: string;
  message: string;
};

export type ConfigFileSnapshot = {
  path: string;
  exists: boolean;
  raw: string | null;
  config: CollectorConfig;
};
