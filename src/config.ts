import { z } from 'zod';
import dotenv from 'dotenv';

// Disable dotenv promotional messages for MCP compatibility (stdout must be clean JSON-RPC only)
process.env.DOTENV_CONFIG_QUIET = '1';

const positiveIntString = (name: string, min: number, max: number, fallback: string) =>
  z
    .string()
    .optional()
    .default(fallback)
    .transform((val) => parseInt(val, 10))
    .refine(
      (val) => !isNaN(val) && val >= min && val <= max,
      `${name} must be between ${min} and ${max}`
    );

// Zod schema for environment variables
export const EnvSchema = z.object({
  MONDAY_API_KEY: z
    .string({ required_error: 'MONDAY_API_KEY is required' })
    .min(20, 'MONDAY_API_KEY appears to be too short (minimum 20 characters)')
    .describe('monday.com personal API token'),

  MONDAY_BOARD_ID: z
    .string({ required_error: 'MONDAY_BOARD_ID is required' })
    .regex(/^\d+$/, 'MONDAY_BOARD_ID must be a positive integer')
    .describe('The one board every operation is scoped to'),

  MONDAY_API_URL: z
    .string()
    .url('MONDAY_API_URL must be a valid URL')
    .optional()
    .default('https://api.monday.com/v2')
    .describe('monday.com GraphQL endpoint'),

  MONDAY_API_VERSION: z
    .string()
    .regex(/^\d{4}-\d{2}$/, 'MONDAY_API_VERSION must look like YYYY-MM')
    .optional()
    .default('2024-10')
    .describe('Value of the API-Version header'),

  MONDAY_MAX_CONCURRENT_REQUESTS: positiveIntString('MONDAY_MAX_CONCURRENT_REQUESTS', 1, 20, '5')
    .describe('Maximum concurrent API requests'),

  MONDAY_REQUEST_TIMEOUT_MS: positiveIntString('MONDAY_REQUEST_TIMEOUT_MS', 1, 60000, '15000')
    .describe('Request timeout in milliseconds'),

  MONDAY_ITEMS_LIMIT: positiveIntString('MONDAY_ITEMS_LIMIT', 1, 5000, '500')
    .describe('Maximum number of items read from the board'),

  MONDAY_ITEMS_PAGE_SIZE: positiveIntString('MONDAY_ITEMS_PAGE_SIZE', 1, 500, '100')
    .describe('Page size used when walking items_page cursors'),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export type ConfigParseResult =
  | { success: true; config: EnvConfig }
  | { success: false; errors: string[] };

export function parseConfig(env: NodeJS.ProcessEnv): ConfigParseResult {
  const result = EnvSchema.safeParse({
    MONDAY_API_KEY: env.MONDAY_API_KEY,
    MONDAY_BOARD_ID: env.MONDAY_BOARD_ID,
    MONDAY_API_URL: env.MONDAY_API_URL,
    MONDAY_API_VERSION: env.MONDAY_API_VERSION,
    MONDAY_MAX_CONCURRENT_REQUESTS: env.MONDAY_MAX_CONCURRENT_REQUESTS,
    MONDAY_REQUEST_TIMEOUT_MS: env.MONDAY_REQUEST_TIMEOUT_MS,
    MONDAY_ITEMS_LIMIT: env.MONDAY_ITEMS_LIMIT,
    MONDAY_ITEMS_PAGE_SIZE: env.MONDAY_ITEMS_PAGE_SIZE,
  });

  if (!result.success) {
    return {
      success: false,
      errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
    };
  }

  return { success: true, config: result.data };
}

// Validate and parse environment variables; exits the process on bad config
export function loadConfig(): EnvConfig {
  dotenv.config();
  const result = parseConfig(process.env);

  if (!result.success) {
    console.error('❌ Invalid environment configuration:');
    console.error(result.errors.map((err) => `  - ${err}`).join('\n'));
    console.error('\n💡 Please check your .env file and ensure all required variables are set correctly.');
    console.error('   Required: MONDAY_API_KEY, MONDAY_BOARD_ID');
    console.error('   Optional: MONDAY_API_URL, MONDAY_API_VERSION, MONDAY_MAX_CONCURRENT_REQUESTS, MONDAY_REQUEST_TIMEOUT_MS, MONDAY_ITEMS_LIMIT, MONDAY_ITEMS_PAGE_SIZE');

    process.exit(1);
  }

  registerSecret(result.config.MONDAY_API_KEY);
  logConfigSummary(result.config);
  return result.config;
}

// ============================================
// SECRET REDACTION
// ============================================

const secrets = new Set<string>();

export function registerSecret(secret: string): void {
  if (secret) secrets.add(secret);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Helper function to redact sensitive data in logs
export function redactSecrets(text: string): string {
  if (!text) return text;

  let redacted = text;
  for (const secret of secrets) {
    redacted = redacted.replace(new RegExp(escapeRegExp(secret), 'g'), '***REDACTED_TOKEN***');
  }

  // monday tokens are JWTs; catch any that slipped through unregistered
  redacted = redacted.replace(/eyJ[\w-]+\.[\w-]+\.[\w-]+/g, '***REDACTED_TOKEN***');
  redacted = redacted.replace(/Bearer\s+[\w\-.]+/gi, 'Bearer ***REDACTED_TOKEN***');

  return redacted;
}

function redactArg(arg: unknown): unknown {
  return typeof arg === 'string' ? redactSecrets(arg) : arg;
}

// Safe logging functions - ALL LOGS GO TO STDERR for MCP compatibility
export const safeLog = {
  info: (message: string, ...args: unknown[]) => {
    console.error(redactSecrets(message), ...args.map(redactArg));
  },

  error: (message: string, ...args: unknown[]) => {
    console.error(redactSecrets(message), ...args.map(redactArg));
  },

  warn: (message: string, ...args: unknown[]) => {
    console.error(redactSecrets(message), ...args.map(redactArg));
  },

  debug: (message: string, ...args: unknown[]) => {
    if (process.env.DEBUG) {
      console.error(redactSecrets(message), ...args.map(redactArg));
    }
  },
};

function logConfigSummary(config: EnvConfig): void {
  safeLog.info('✅ Configuration loaded successfully');
  safeLog.info(`   API URL: ${config.MONDAY_API_URL} (version ${config.MONDAY_API_VERSION})`);
  safeLog.info(`   Board ID: ${config.MONDAY_BOARD_ID}`);
  safeLog.info(`   Max Concurrent Requests: ${config.MONDAY_MAX_CONCURRENT_REQUESTS}`);
  safeLog.info(`   Request Timeout: ${config.MONDAY_REQUEST_TIMEOUT_MS}ms`);
  safeLog.info(`   Items Limit: ${config.MONDAY_ITEMS_LIMIT} (page size ${config.MONDAY_ITEMS_PAGE_SIZE})`);
}
