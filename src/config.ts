/* src/config.ts
   Centralized config: AI providers, reference data, request limits */
import path from 'node:path';
import 'dotenv/config';


const env = (name: string, fallback?: string) =>
  (process.env[name] ?? fallback ?? '').toString();

const envInt = (name: string, fallback: number) => {
  const n = Number.parseInt(env(name), 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
};

export type AIProvider = 'dev' | 'openai' | 'anthropic';

function parseProvider(raw: string): AIProvider {
  const v = raw.trim().toLowerCase();
  if (v === 'openai' || v === 'anthropic') return v;
  return 'dev';
}

export const config = {
  nodeEnv: env('NODE_ENV', 'development'),
  port: envInt('PORT', 4000),
  host: env('HOST', '0.0.0.0'),

  // ── CORS origins ─────────────────────────────────────────────────
  cors: {
    origins: env('CORS_ORIGINS', 'http://localhost:5173')
      .split(',')
      .map(s => s.trim())
      .filter(Boolean),
  },

  // ── AI ───────────────────────────────────────────────────────────
  ai: {
    provider: parseProvider(env('AI_PROVIDER', 'dev')),
    openaiKey: env('OPENAI_API_KEY'),
    // OpenRouter and other OpenAI-compatible gateways
    openaiBaseUrl: env('OPENAI_BASE_URL') || undefined,
    anthropicKey: env('ANTHROPIC_API_KEY'),
    timeoutMs: envInt('AI_REQUEST_TIMEOUT_MS', 60_000),
    model: {
      openai: env('AI_MODEL_OPENAI', 'gpt-4o-mini'),
      anthropic: env('AI_MODEL_ANTHROPIC', 'claude-sonnet-4-5-20250929'),
    },
  },

  // ── Reference data (central acts) ────────────────────────────────
  reference: {
    actsDir: path.resolve(process.cwd(), env('REFERENCE_ACTS_DIR', 'data/acts')),
  },

  // ── Request limits ───────────────────────────────────────────────
  limits: {
    maxTextLength: envInt('MAX_TEXT_LENGTH', 100_000),
    uploadMaxBytes: envInt('MAX_UPLOAD_BYTES', 10 * 1024 * 1024),
  },
} as const;

export type AppConfig = typeof config;
export type AIConfig = AppConfig['ai'];
