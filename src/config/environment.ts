import { z } from 'zod';
import fs from 'fs';
import { ConfigurationError } from '../core/errors';

const EnvironmentSchema = z
  .object({
    // Model service
    MODEL_PROVIDER: z.enum(['ollama', 'openai']).default('ollama'),
    MODEL_HOST: z.string().min(1, 'Model host must not be empty').default('localhost'),
    MODEL_PORT: z.coerce.number().int().min(1).max(65535).default(11434),
    MODEL_NAME: z.string().min(1, 'Model name must not be empty').default('llama3.1'),
    MODEL_API_KEY: z.string().optional(),
    MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),

    // Fetching and chunking
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
    CHUNK_MAX_LENGTH: z.coerce.number().int().positive().default(6000),
    CHUNK_STRATEGY: z.enum(['fixed', 'boundary']).default('fixed'),

    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),

    // Node environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  })
  .superRefine((env, ctx) => {
    if (env.MODEL_PROVIDER === 'openai' && !env.MODEL_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MODEL_API_KEY'],
        message: 'Model API key is required for the openai provider',
      });
    }
  });

export type Environment = z.infer<typeof EnvironmentSchema>;

let cachedEnvironment: Environment | null = null;

export function getEnvironment(): Environment {
  if (cachedEnvironment) {
    return cachedEnvironment;
  }

  try {
    cachedEnvironment = EnvironmentSchema.parse(process.env);
    return cachedEnvironment;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Environment validation failed:\n${issues.join('\n')}`);
    }
    throw error;
  }
}

// Check if running in Docker container
export function isRunningInDocker(): boolean {
  try {
    fs.accessSync('/.dockerenv');
    return true;
  } catch {
    // not a docker container, keep looking
  }

  if (process.env.DOCKER_CONTAINER) {
    return true;
  }

  try {
    const cgroup = fs.readFileSync('/proc/1/cgroup', 'utf8');
    return cgroup.includes('docker') || cgroup.includes('containerd');
  } catch {
    // not on Linux or /proc not available
  }

  return false;
}

// A model server on the host is reachable from a container via host.docker.internal
export function fixDockerHost(host: string): string {
  return host.replace(/^(127\.0\.0\.1|localhost)$/i, 'host.docker.internal');
}

export function getModelServerUrl(env: Environment = getEnvironment()): string {
  const host = isRunningInDocker() ? fixDockerHost(env.MODEL_HOST) : env.MODEL_HOST;
  return `http://${host}:${env.MODEL_PORT}`;
}

export function validateEnvironment(): void {
  getEnvironment(); // This will throw if validation fails
}

// For testing purposes
export function clearEnvironmentCache(): void {
  cachedEnvironment = null;
}
