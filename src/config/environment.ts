import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
config();

// Blank entries in .env count as unset
const optionalUrl = (message: string) =>
  z.preprocess((value) => (value === '' ? undefined : value), z.string().url(message).optional());

const optionalSecret = (message: string) =>
  z.preprocess((value) => (value === '' ? undefined : value), z.string().min(1, message).optional());

// Define environment variable schema with Zod for type-safe validation
const envSchema = z
  .object({
    // Node environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Server configuration
    PORT: z.string().default('3000').transform(Number),

    // Listing store backend
    STORE_DRIVER: z.enum(['memory', 'supabase']).default('memory'),

    // Supabase configuration (required when STORE_DRIVER=supabase)
    SUPABASE_URL: optionalUrl('Invalid Supabase URL'),
    SUPABASE_SERVICE_ROLE_KEY: optionalSecret('Supabase service role key is required'),
    SUPABASE_LISTINGS_TABLE: z.string().min(1).default('listings'),

    // Optimistic concurrency configuration
    TRANSACTION_MAX_ATTEMPTS: z.string().default('5').transform(Number).pipe(z.number().int().positive()),
    TRANSACTION_BACKOFF_MS: z.string().default('15').transform(Number).pipe(z.number().int().nonnegative()),

    // Conversation sessions (intake and claim requests)
    SESSION_TTL_MINUTES: z.string().default('30').transform(Number).pipe(z.number().positive()),

    // Chat transport webhook
    NOTIFY_WEBHOOK_URL: optionalUrl('Invalid webhook URL'),
    NOTIFY_TIMEOUT_MS: z.string().default('5000').transform(Number),

    // Logging configuration
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

    // CORS configuration
    ALLOWED_ORIGINS: z.string().default('*'),
  })
  .superRefine((value, ctx) => {
    if (value.STORE_DRIVER !== 'supabase') return;
    if (!value.SUPABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_URL'],
        message: 'SUPABASE_URL is required when STORE_DRIVER=supabase',
      });
    }
    if (!value.SUPABASE_SERVICE_ROLE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_SERVICE_ROLE_KEY'],
        message: 'SUPABASE_SERVICE_ROLE_KEY is required when STORE_DRIVER=supabase',
      });
    }
  });

// Parse and validate environment variables
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const errorMessage = `❌ Invalid environment variables: ${JSON.stringify(parsed.error.format(), null, 2)}`;
  console.error(errorMessage);
  throw new Error(errorMessage);
}

// Export validated environment variables
export const env = parsed.data;

// Export session timeout in milliseconds (for convenience)
export const SESSION_TTL_MS = env.SESSION_TTL_MINUTES * 60 * 1000;

// Log environment on startup
if (env.NODE_ENV !== 'test') {
  console.log('✅ Environment variables validated successfully');
  console.log(`📝 Environment: ${env.NODE_ENV}`);
  console.log(`🚀 Port: ${env.PORT}`);
  console.log(`🗄️  Store driver: ${env.STORE_DRIVER}`);
  console.log(`🔁 Transaction attempts: ${env.TRANSACTION_MAX_ATTEMPTS}`);
}
