import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import { DEFAULT_CONFIG } from './defaults.js';
import { LOG_LEVELS, LogLevel } from '../utils/Logger.js';
import { ConfiguracionReintento, CONFIGURACION_REINTENTO_PREDETERMINADA } from '../utils/ErrorHandler.js';

export interface ValidationResult {
  isValid: boolean;
  missingFields: string[];
  errors: string[];
}

export interface ExportConfig {
  apiBaseUrl: string;
  token?: string;
  concurrency: number;
  retry: ConfiguracionReintento;
  logLevel: LogLevel;
}

const bool = () =>
  z.preprocess((v) => {
    if (typeof v === 'string') {
      const s = v.trim().toLowerCase();
      if (['true', '1', 'yes', 'y', 'si', 'sí'].includes(s)) return true;
      if (['false', '0', 'no', 'n', ''].includes(s)) return false;
    }
    return v;
  }, z.boolean());

const intInRange = (min: number, max: number, def: number) =>
  z.preprocess((v) => {
    if (v === undefined || (typeof v === 'string' && v.trim() === '')) return def;
    if (typeof v === 'string') {
      const n = Number(v);
      if (Number.isFinite(n)) return n;
    }
    return v;
  }, z.number().int().min(min).max(max));

const EnvSchema = z.object({
  SPOTIFY_API_URL: z
    .string()
    .url('SPOTIFY_API_URL debe ser una URL válida')
    .optional()
    .default(DEFAULT_CONFIG.API_BASE_URL),
  SPOTIFY_TOKEN: z.string().trim().optional(),
  EXPORT_CONCURRENCY: intInRange(1, 50, DEFAULT_CONFIG.CONCURRENCY),
  EXPORT_MAX_RETRIES: intInRange(0, 10, DEFAULT_CONFIG.MAX_RETRIES),
  EXPORT_RETRY_NETWORK_ERRORS: bool().optional().default(DEFAULT_CONFIG.RETRY_NETWORK_ERRORS),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional().default(DEFAULT_CONFIG.LOG_LEVEL),
});

type Env = Record<string, string | undefined>;

export class ConfigManager {
  constructor(private readonly env: Env = process.env) {}

  /**
   * Carga un archivo .env (si existe) en process.env. Las variables ya definidas tienen prioridad.
   */
  static loadEnvFile(path?: string): void {
    loadDotenv(path ? { path } : undefined);
  }

  /**
   * Copia con valores que tienen prioridad sobre el entorno (por ejemplo, los flags
   * de la línea de comandos). Los valores indefinidos no pisan nada.
   */
  withOverrides(overrides: Env): ConfigManager {
    const env: Env = { ...this.env };
    for (const [nombre, valor] of Object.entries(overrides)) {
      if (valor !== undefined) {
        env[nombre] = valor;
      }
    }
    return new ConfigManager(env);
  }

  validate(): ValidationResult {
    const result: ValidationResult = {
      isValid: true,
      missingFields: [],
      errors: [],
    };

    const parsed = EnvSchema.safeParse(this.env);
    if (!parsed.success) {
      result.isValid = false;
      for (const issue of parsed.error.issues) {
        result.errors.push(`${issue.path.join('.')}: ${issue.message}`);
      }
    } else if (!parsed.data.SPOTIFY_TOKEN) {
      result.missingFields.push('SPOTIFY_TOKEN');
    }

    return result;
  }

  /**
   * Configuración de exportación a partir del entorno
   */
  load(): ExportConfig {
    const parsed = EnvSchema.safeParse(this.env);
    if (!parsed.success) {
      throw new Error(
        `Configuración inválida: ${parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join(', ')}`
      );
    }

    const env = parsed.data;
    return {
      apiBaseUrl: env.SPOTIFY_API_URL,
      token: env.SPOTIFY_TOKEN || undefined,
      concurrency: env.EXPORT_CONCURRENCY,
      retry: {
        ...CONFIGURACION_REINTENTO_PREDETERMINADA,
        maxReintentos: env.EXPORT_MAX_RETRIES,
        reintentarErroresRed: env.EXPORT_RETRY_NETWORK_ERRORS,
      },
      logLevel: env.LOG_LEVEL,
    };
  }
}
