import type { AxiosError } from 'axios';
import chalk from 'chalk';
import { promises as fs } from 'fs';
import path from 'path';
import { DEFAULT_CONFIG } from '../config/defaults.js';

export interface ErrorLogEntry {
  timestamp: string;
  context: string;
  method: string;
  url: string;
  statusCode: number | null;
  statusText: string;
  params?: Record<string, unknown>;
  headers?: Record<string, unknown>;
  responseData?: unknown;
  errorMessage: string;
}

const REDACTED = '[REDACTED]';
const SENSITIVE_KEYS = ['api_key', 'authorization', 'client_secret', 'code', 'password', 'access_token'];

/**
 * Registro en disco de las respuestas HTTP fallidas (Last.fm, Mastodon)
 */
export class ErrorLogger {
  private readonly logFile: string;

  constructor(private readonly logDir: string) {
    this.logFile = path.join(logDir, DEFAULT_CONFIG.ERROR_LOG_FILE);
  }

  get logPath(): string {
    return this.logFile;
  }

  /**
   * Registrar un error HTTP con información detallada (sin secretos)
   */
  async logHttpError(error: AxiosError, context: string): Promise<void> {
    try {
      await fs.mkdir(this.logDir, { recursive: true, mode: 0o700 });

      const logEntry: ErrorLogEntry = {
        timestamp: new Date().toISOString(),
        context,
        method: error.config?.method?.toUpperCase() || 'UNKNOWN',
        url: this.redactUrl(error.config?.url || 'UNKNOWN'),
        statusCode: error.response?.status ?? null,
        statusText: error.response?.statusText ?? '',
        params: this.redactRecord(error.config?.params),
        headers: this.redactRecord(error.config?.headers?.toJSON()),
        responseData: error.response?.data,
        errorMessage: error.message
      };

      await this.writeLogEntry(logEntry);
    } catch (logError) {
      console.error(chalk.yellow('⚠️  No se pudo registrar el error HTTP:'), logError instanceof Error ? logError.message : logError);
    }
  }

  /**
   * Obtener logs de errores recientes
   */
  async getRecentLogs(limit: number = 10): Promise<ErrorLogEntry[]> {
    const logs = await this.readLogs();
    return logs.slice(-limit);
  }

  private async writeLogEntry(logEntry: ErrorLogEntry): Promise<void> {
    let existingLogs = await this.readLogs();

    existingLogs.push(logEntry);

    // Mantener solo las últimas entradas
    if (existingLogs.length > DEFAULT_CONFIG.MAX_ERROR_LOG_ENTRIES) {
      existingLogs = existingLogs.slice(-DEFAULT_CONFIG.MAX_ERROR_LOG_ENTRIES);
    }

    await fs.writeFile(this.logFile, JSON.stringify(existingLogs, null, 2), { encoding: 'utf-8', mode: 0o600 });
  }

  private async readLogs(): Promise<ErrorLogEntry[]> {
    let data: string;
    try {
      data = await fs.readFile(this.logFile, 'utf-8');
    } catch {
      // El archivo todavía no existe
      return [];
    }

    try {
      const parsed: unknown = JSON.parse(data);
      return Array.isArray(parsed) ? parsed.filter(isErrorLogEntry) : [];
    } catch {
      // Archivo corrupto: se empieza de nuevo
      return [];
    }
  }

  private redactRecord(record: unknown): Record<string, unknown> | undefined {
    if (typeof record !== 'object' || record === null) {
      return undefined;
    }

    return Object.fromEntries(
      Object.entries(record).map(([key, value]) => [
        key,
        SENSITIVE_KEYS.includes(key.toLowerCase()) ? REDACTED : value
      ])
    );
  }

  private redactUrl(url: string): string {
    const queryStart = url.indexOf('?');
    if (queryStart === -1) {
      return url;
    }

    const params = new URLSearchParams(url.slice(queryStart + 1));
    for (const key of Array.from(params.keys())) {
      if (SENSITIVE_KEYS.includes(key.toLowerCase())) {
        params.set(key, REDACTED);
      }
    }
    return `${url.slice(0, queryStart)}?${params.toString()}`;
  }
}

function isErrorLogEntry(value: unknown): value is ErrorLogEntry {
  return typeof value === 'object' && value !== null &&
    'timestamp' in value && typeof value.timestamp === 'string' &&
    'context' in value && typeof value.context === 'string';
}
