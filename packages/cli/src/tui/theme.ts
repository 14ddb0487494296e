// --- Primitives (raw ANSI codes) ---
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const INVERSE = "\x1b[7m";
const RED = "\x1b[31m";

// --- Semantic theme (exported) ---
export const t = {
  reset: RESET,

  // Text formatting
  bold: BOLD,
  dim: DIM,
  inverse: INVERSE,

  // Semantic roles
  label: DIM,           // line index column
  endMarker: INVERSE,   // "(END)" row once input is exhausted
  error: RED,           // startup errors on stderr
} as const;
