import * as dotenv from 'dotenv';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { TemplateFactory } from './core/templates/TemplateFactory.js';
import { DEFAULT_DISTRIBUTOR_PRIORITY } from './application/services/OfferSelection.js';

// Load environment variables from .env file
dotenv.config();

const DATA_DIR = path.join(os.homedir(), '.pcb-design-assistant');

// Zod validation schema
const ServerConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  ollama: z.object({
    apiUrl: z.string().url('Invalid Ollama URL format'),
    model: z.string().min(1, 'A model name is required'),
    template: z.enum(['legacy', 'chat']),
    timeoutMs: z.number().int().min(1000).max(600000),
    retryAttempts: z.number().int().min(1).max(5),
  }),
  conversation: z.object({
    capacity: z.number().int().min(2).max(200),
  }),
  settings: z.object({
    path: z.string().min(1),
  }),
  transcripts: z.object({
    enabled: z.boolean(),
    databasePath: z.string().min(1),
  }),
  pricing: z.object({
    serverCommand: z.string().min(1).optional(),
    serverArgs: z.array(z.string()),
    serverUrl: z.string().url('Invalid pricing server URL').optional(),
    timeoutMs: z.number().int().min(100).max(60000),
    waitMs: z.number().int().min(0).max(60000),
    distributorPriority: z.array(z.string().min(1)).min(1, 'At least 1 distributor is required'),
    demoSeed: z.number().int(),
  }),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

type CliArgs = Record<string, string | boolean>;

/**
 * Parse command line arguments
 * Usage: pcb-design-assistant --ollama-url http://localhost:11434 --model llama3.2:3b --debug
 */
export function parseArgs(argv: readonly string[] = process.argv): CliArgs {
  const args: CliArgs = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build the runtime configuration. CLI arguments win over environment
 * variables, which win over defaults. Invalid configuration exits the process.
 */
export function getConfig(argv: readonly string[] = process.argv, env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const cliArgs = parseArgs(argv);

  const getOptional = (cliKey: string, envKey: string): string | undefined => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || undefined;
  };

  const getString = (cliKey: string, envKey: string, defaultValue: string): string =>
    getOptional(cliKey, envKey) ?? defaultValue;

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const value = getOptional(cliKey, envKey);
    return value ? Number(value) : defaultValue;
  };

  const getStringArray = (cliKey: string, envKey: string, defaultValue: readonly string[]): string[] => {
    const value = getOptional(cliKey, envKey);
    if (!value) return [...defaultValue];
    return value
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  };

  const model = getString('model', 'OLLAMA_MODEL', 'llama3.2:3b');

  // "node dist/pricing-server.js" -> command + args
  const [serverCommand, ...serverArgs] = (getOptional('pricing-command', 'PRICING_SERVER_COMMAND') ?? '')
    .split(/\s+/)
    .filter((part) => part.length > 0);

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'pcb-design-assistant'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    ollama: {
      apiUrl: getString('ollama-url', 'OLLAMA_API_URL', 'http://localhost:11434'),
      model,
      template: TemplateFactory.resolveTemplateType(model, getOptional('template', 'OLLAMA_TEMPLATE')),
      timeoutMs: getNumber('inference-timeout', 'INFERENCE_TIMEOUT_MS', 60000),
      retryAttempts: getNumber('retry-attempts', 'INFERENCE_RETRY_ATTEMPTS', 2),
    },
    conversation: {
      capacity: getNumber('context-capacity', 'CONTEXT_CAPACITY', 20),
    },
    settings: {
      path: getString('settings-path', 'SETTINGS_PATH', path.join(DATA_DIR, 'config.json')),
    },
    transcripts: {
      enabled: getBoolean('transcripts', 'TRANSCRIPTS_ENABLED', true),
      databasePath: getString('transcript-db', 'TRANSCRIPT_DB_PATH', path.join(DATA_DIR, 'transcripts.db')),
    },
    pricing: {
      serverCommand,
      serverArgs,
      serverUrl: getOptional('pricing-url', 'PRICING_SERVER_URL'),
      timeoutMs: getNumber('pricing-timeout', 'PRICING_TIMEOUT_MS', 4000),
      waitMs: getNumber('pricing-wait', 'PRICING_WAIT_MS', 2500),
      distributorPriority: getStringArray('distributors', 'DISTRIBUTOR_PRIORITY', DEFAULT_DISTRIBUTOR_PRIORITY),
      demoSeed: getNumber('demo-seed', 'DEMO_PRICING_SEED', 0),
    },
  };

  const parsed = ServerConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    console.error('\n❌ Configuration Validation Failed!\n');
    console.error('Errors:');
    parsed.error.errors.forEach((err) => {
      const field = err.path.join('.');
      console.error(`  • ${field || 'root'}: ${err.message}`);
    });
    console.error('\n💡 Tips:');
    console.error('  - Check your .env file');
    console.error('  - Verify CLI arguments');
    console.error('  - Ollama URL must be valid (e.g., http://localhost:11434)');
    console.error('  - OLLAMA_TEMPLATE must be "chat" or "legacy"');
    console.error();
    process.exit(1);
  }

  return parsed.data;
}

/**
 * Print configuration summary to stderr. Carries no credentials.
 */
export function printConfigInfo(config: ServerConfig): void {
  const pricingTarget = config.pricing.serverUrl
    ? config.pricing.serverUrl
    : config.pricing.serverCommand
      ? [config.pricing.serverCommand, ...config.pricing.serverArgs].join(' ')
      : 'bundled pcb-pricing-server';

  console.error('═'.repeat(68));
  console.error('  PCB Design Assistant MCP Server - Configuration');
  console.error('═'.repeat(68));

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🔗 Ollama: ${config.ollama.apiUrl}`);
  console.error(`🤖 Model: ${config.ollama.model} (${config.ollama.template} template, timeout ${config.ollama.timeoutMs}ms)`);
  console.error(`💬 Memory: ${config.conversation.capacity} turns`);
  console.error(`⚙️  Settings: ${config.settings.path}`);
  console.error(`🗄️  Transcripts: ${config.transcripts.enabled ? config.transcripts.databasePath : 'disabled'}`);
  console.error(
    `💲 Pricing: ${pricingTarget} | timeout ${config.pricing.timeoutMs}ms | wait ${config.pricing.waitMs}ms | ` +
      `distributors ${config.pricing.distributorPriority.join(' > ')}`
  );

  console.error('\n' + '─'.repeat(68));
}
