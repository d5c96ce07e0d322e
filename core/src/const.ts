export const DIGEST_ALGO = "sha1";

export const DEFAULT_WINDOW = 8;
export const DEFAULT_MIN_CHARS = 120;
export const DEFAULT_TOP = 50;

export const DEFAULT_EXTENSIONS: readonly string[] = [
  ".cs",
  ".go",
  ".java",
  ".js",
  ".jsx",
  ".php",
  ".py",
  ".rb",
  ".rs",
  ".ts",
  ".tsx",
];

export const DEFAULT_EXCLUDED_DIRS: readonly string[] = [
  ".git",
  "__pycache__",
  "build",
  "coverage",
  "dist",
  "node_modules",
  "vendor",
];
