import chalk, { Chalk } from "chalk";

import { SERVICE_PALETTE } from "./palette.js";

const hasForceColor =
  typeof process.env.FORCE_COLOR === "string" &&
  process.env.FORCE_COLOR.trim().length > 0 &&
  process.env.FORCE_COLOR.trim() !== "0";

const baseChalk = process.env.NO_COLOR && !hasForceColor ? new Chalk({ level: 0 }) : chalk;

const hex = (value: string) => baseChalk.hex(value);

export const theme = {
  accent: hex(SERVICE_PALETTE.accent),
  success: hex(SERVICE_PALETTE.success),
  warn: hex(SERVICE_PALETTE.warn),
  error: hex(SERVICE_PALETTE.error),
  muted: hex(SERVICE_PALETTE.muted),
  heading: baseChalk.bold.hex(SERVICE_PALETTE.accent),
  command: hex(SERVICE_PALETTE.accentBright),
} as const;

export const isRich = () => Boolean(baseChalk.level > 0);

export const colorize = (rich: boolean, color: (value: string) => string, value: string) =>
  rich ? color(value) : value;

export const formatLine = (label: string, value: string) => {
  const rich = isRich();
  return `${colorize(rich, theme.muted, `${label}:`)} ${colorize(rich, theme.command, value)}`;
};
