// Console palette shared by the theme and prompt styling.
export const SERVICE_PALETTE = {
  accent: "#3B82F6",
  accentBright: "#60A5FA",
  success: "#22C55E",
  warn: "#F59E0B",
  error: "#EF4444",
  muted: "#94A3B8",
} as const;
