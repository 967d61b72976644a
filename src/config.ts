import * as dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_MODEL, MODEL_CHOICES, ModelId } from './core/entities/Model.js';
import { ConfigurationError } from './core/errors.js';
import { DEFAULT_GROQ_API_URL, DEFAULT_REQUEST_TIMEOUT_MS } from './infrastructure/http/GroqApiClient.js';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
    sessionTimeoutMinutes: number;
  };
  groq: {
    apiKey: string;
    apiUrl: string;
    models: readonly ModelId[];
    defaultModel: ModelId;
    timeoutMs: number;
  };
  webUI: {
    enabled: boolean;
    backendPort: number;
  };
  mcp: {
    transport: 'stdio' | 'disabled';
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
    sessionTimeoutMinutes: z.number().int().min(1).max(1440),
  }),
  groq: z.object({
    apiKey: z.string().min(1, 'GROQ_API_KEY not set. Please add it in your .env file.'),
    apiUrl: z.string().url('Invalid Groq API URL format'),
    models: z.array(z.enum(MODEL_CHOICES)).min(1),
    defaultModel: z.enum(MODEL_CHOICES, {
      errorMap: () => ({ message: `Default model must be one of: ${MODEL_CHOICES.join(', ')}` }),
    }),
    timeoutMs: z.number().int().min(1000).max(600000),
  }),
  webUI: z.object({
    enabled: z.boolean(),
    backendPort: z.number().int().min(0).max(65535),
  }),
  mcp: z.object({
    transport: z.enum(['stdio', 'disabled']),
  }),
});

/**
 * Parse command line arguments
 * Usage: node dist/index.js --groq-api-key <key> --default-model llama-3.3-70b-versatile --debug
 */
export function parseArgs(argv: string[] = process.argv): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

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
 * Build configuration from CLI arguments and environment variables.
 * Throws ConfigurationError listing every invalid field.
 */
export function loadConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  // Helpers to get value from CLI args or env, with type conversion
  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return parseInt(cliValue, 10);
    const envValue = env[envKey];
    return envValue ? parseInt(envValue, 10) : defaultValue;
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'article-humanizer'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
      sessionTimeoutMinutes: getNumber('session-timeout', 'SESSION_TIMEOUT_MINUTES', 60),
    },
    groq: {
      apiKey: getString('groq-api-key', 'GROQ_API_KEY', ''),
      apiUrl: getString('groq-api-url', 'GROQ_API_URL', DEFAULT_GROQ_API_URL).replace(/\/+$/, ''),
      models: MODEL_CHOICES,
      defaultModel: getString('default-model', 'DEFAULT_MODEL', DEFAULT_MODEL),
      timeoutMs: getNumber('request-timeout', 'REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS),
    },
    webUI: {
      enabled: getBoolean('web-ui', 'WEB_UI_ENABLED', true),
      backendPort: getNumber('backend-port', 'BACKEND_PORT', 3001),
    },
    mcp: {
      transport: getString('mcp-transport', 'MCP_TRANSPORT', 'stdio'),
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }
  return parsed.data;
}

/**
 * Get configuration, halting the process when it is invalid
 */
export function getConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.issues.forEach((issue) => console.error(`  • ${issue}`));
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file (see .env.example)');
      console.error('  - Verify CLI arguments');
      console.error(`  - Models: ${MODEL_CHOICES.join(', ')}`);
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error('═'.repeat(68));
  console.error('              Article Humanizer (Groq) - Configuration');
  console.error('═'.repeat(68));

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🕒 Idle sessions expire after ${config.server.sessionTimeoutMinutes} minutes`);
  console.error(`🔗 Groq: ${config.groq.apiUrl} (timeout ${config.groq.timeoutMs}ms)`);
  console.error(`🤖 Models: ${config.groq.models.length} available`);
  config.groq.models.forEach((model, idx) => {
    const marker = model === config.groq.defaultModel ? ' (default)' : '';
    console.error(`   ${idx + 1}. ${model}${marker}`);
  });

  if (config.webUI.enabled) {
    console.error(`\n🌐 Web UI: http://localhost:${config.webUI.backendPort}`);
  }

  console.error(`📡 MCP: ${config.mcp.transport === 'stdio' ? 'STDIO' : 'disabled'}`);
  console.error('\n' + '─'.repeat(68));
}
