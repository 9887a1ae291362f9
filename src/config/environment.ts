import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
config();

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((val) => val === 'true');

// Define environment variable schema with Zod for type-safe validation
const envSchema = z
  .object({
    // Node environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Server configuration
    PORT: z.string().default('3000').transform(Number),

    // Storage backend
    STORAGE_DRIVER: z.enum(['memory', 'supabase']).default('memory'),

    // Supabase configuration (required for the supabase driver)
    SUPABASE_URL: z.string().url('Invalid Supabase URL').optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, 'Supabase service role key is required').optional(),

    // Inventory file used by the memory driver
    INVENTORY_CSV_PATH: z.string().min(1).optional(),
    INVENTORY_WRITE_THROUGH: booleanFlag('true'),

    // Ledger policy
    ALLOW_NEGATIVE_STOCK: booleanFlag('false'),
    TX_MAX_ATTEMPTS: z
      .string()
      .default('3')
      .transform(Number)
      .pipe(z.number().int().min(1, 'TX_MAX_ATTEMPTS must be at least 1')),

    // Logging configuration
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

    // CORS configuration
    ALLOWED_ORIGINS: z.string().default('*'),
  })
  .superRefine((val, ctx) => {
    if (val.STORAGE_DRIVER !== 'supabase') return;
    if (!val.SUPABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_URL'],
        message: 'SUPABASE_URL is required when STORAGE_DRIVER=supabase',
      });
    }
    if (!val.SUPABASE_SERVICE_ROLE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_SERVICE_ROLE_KEY'],
        message: 'SUPABASE_SERVICE_ROLE_KEY is required when STORAGE_DRIVER=supabase',
      });
    }
  });

export type Environment = z.infer<typeof envSchema>;

// Parse and validate environment variables
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const errorMessage = `❌ Invalid environment variables: ${JSON.stringify(parsed.error.format(), null, 2)}`;
  console.error(errorMessage);
  throw new Error(errorMessage);
}

// Export validated environment variables
export const env: Environment = parsed.data;

// Log environment on startup
if (env.NODE_ENV !== 'test') {
  console.log('✅ Environment variables validated successfully');
  console.log(`📝 Environment: ${env.NODE_ENV}`);
  console.log(`🚀 Port: ${env.PORT}`);
  console.log(`🗄️  Storage driver: ${env.STORAGE_DRIVER}`);
  console.log(`📦 Negative stock allowed: ${env.ALLOW_NEGATIVE_STOCK}`);
}
