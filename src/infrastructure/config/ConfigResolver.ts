import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Config } from '../../core/entities/Settings.js';
import { ANALYSIS_CONTEXTS, INTERACTION_MODES, LANGUAGE_TAGS } from '../../core/entities/Settings.js';
import { ConfigIOError, errorMessage } from '../../core/errors.js';
import type { DebugLog } from '../../utils/logging.js';
import { logEvent } from '../../utils/logging.js';

export const CREDENTIAL_ENV_VAR = 'NEXAR_TOKEN';

const PersistedSettingsSchema = z.object({
  api_key: z.string().trim().min(1).optional().catch(undefined),
  demo_mode: z.boolean().default(false),
  language: z.enum(LANGUAGE_TAGS).default('en'),
  ai_mode: z.enum(INTERACTION_MODES).default('analysis'),
  analysis_context: z.enum(ANALYSIS_CONTEXTS).default('pcb'),
  last_updated: z.string().optional(),
});

export type PersistedSettings = z.infer<typeof PersistedSettingsSchema>;

let tempCounter = 0;

/**
 * Copy of the settings that is safe to log: the credential keeps its first
 * four characters only.
 */
export function redactConfig(config: Config): Omit<Config, 'api_key'> & { api_key: string | null } {
  return {
    ...config,
    api_key: config.api_key ? `${config.api_key.slice(0, 4)}…` : null,
  };
}

export interface ConfigResolverOptions {
  env?: NodeJS.ProcessEnv;
  debugLog?: DebugLog;
}

/**
 * Resolves and persists user settings.
 *
 * Credential order: the persisted `api_key`, then the NEXAR_TOKEN environment
 * variable, otherwise demo mode. The result is cached for the session; only
 * `save` changes it.
 */
export class ConfigResolver {
  private cached: Config | undefined;
  private persisted: PersistedSettings | undefined;
  private readonly env: NodeJS.ProcessEnv;
  private readonly debugLog: DebugLog;

  constructor(
    private readonly filePath: string,
    options: ConfigResolverOptions = {}
  ) {
    this.env = options.env ?? process.env;
    this.debugLog = options.debugLog ?? (() => undefined);
  }

  get path(): string {
    return this.filePath;
  }

  resolve(): Config {
    if (!this.cached) {
      this.persisted = this.readPersisted();
      this.cached = this.toConfig(this.persisted);
      this.debugLog(`Resolved settings: ${JSON.stringify(redactConfig(this.cached))}`);
    }
    return this.cached;
  }

  /**
   * Write-to-temp then rename. On failure the previous file and the cached
   * settings are untouched and ConfigIOError is thrown.
   *
   * A credential that only came from the environment is not written to the
   * file, and `demo_mode` is only taken from `config` when it has a credential
   * (without one, demo mode is implied and the stored flag is kept).
   */
  save(config: Config): Config {
    const previous = this.persisted ?? this.readPersisted();
    const fromEnvOnly = config.api_key !== undefined && previous.api_key === undefined && config.api_key === this.envKey();
    const document: PersistedSettings = PersistedSettingsSchema.parse({
      api_key: fromEnvOnly ? undefined : config.api_key,
      demo_mode: config.api_key === undefined ? previous.demo_mode : config.demo_mode,
      language: config.language,
      ai_mode: config.ai_mode,
      analysis_context: config.analysis_context,
      last_updated: new Date().toISOString(),
    });
    const tempPath = `${this.filePath}.${process.pid}.${++tempCounter}.tmp`;

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, JSON.stringify(document, null, 2), { encoding: 'utf-8', mode: 0o600 });
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      this.removeTemp(tempPath);
      throw new ConfigIOError(`Could not save settings to ${this.filePath}: ${errorMessage(error)}`, this.filePath, {
        cause: error,
      });
    }

    this.persisted = document;
    this.cached = this.toConfig(document);
    this.debugLog(`Saved settings: ${JSON.stringify(redactConfig(this.cached))}`);
    return this.cached;
  }

  private envKey(): string | undefined {
    return this.env[CREDENTIAL_ENV_VAR]?.trim() || undefined;
  }

  private readPersisted(): PersistedSettings {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return PersistedSettingsSchema.parse({});
      }
      throw new ConfigIOError(`Could not read settings from ${this.filePath}: ${errorMessage(error)}`, this.filePath, {
        cause: error,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logEvent({
        component: 'config',
        event: 'settings_unreadable',
        path: this.filePath,
        error: errorMessage(error),
        severity: 'MEDIUM',
      });
      return PersistedSettingsSchema.parse({});
    }

    const parsed = PersistedSettingsSchema.safeParse(json);
    if (!parsed.success) {
      logEvent({
        component: 'config',
        event: 'settings_invalid',
        path: this.filePath,
        error: parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
        severity: 'MEDIUM',
      });
      return PersistedSettingsSchema.parse({});
    }
    return parsed.data;
  }

  private toConfig(settings: PersistedSettings): Config {
    const apiKey = settings.api_key ?? this.envKey();
    return {
      api_key: apiKey,
      demo_mode: settings.demo_mode || apiKey === undefined,
      language: settings.language,
      ai_mode: settings.ai_mode,
      analysis_context: settings.analysis_context,
    };
  }

  private removeTemp(tempPath: string): void {
    try {
      fs.rmSync(tempPath, { force: true });
    } catch (error) {
      logEvent({ component: 'config', event: 'temp_cleanup_failed', path: tempPath, error: errorMessage(error), severity: 'LOW' });
    }
  }
}

// fs errors from another realm (Jest's sandbox) fail `instanceof Error`.
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
