import * as dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
  };
  http: {
    host: string;
    port: number;
    corsOrigins: string[];
    webSocket: boolean;
  };
  generation: {
    downloadsDir: string;
    timeScale: number;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  http: z.object({
    host: z.string().min(1, 'Host must not be empty'),
    port: z.number().int().min(0).max(65535),
    corsOrigins: z.array(z.string().min(1)).min(1, 'At least 1 CORS origin is required'),
    webSocket: z.boolean(),
  }),
  generation: z.object({
    downloadsDir: z.string().min(1, 'Downloads directory must not be empty'),
    timeScale: z.number().positive('Time scale must be greater than 0').max(10),
  }),
});

type Env = Record<string, string | undefined>;

/**
 * Parse command line arguments
 * Usage: node dist/index.js --port 8000 --downloads-dir ./downloads --debug
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
 * Build and validate configuration from CLI arguments, then environment,
 * then defaults. Throws a ZodError when the result is invalid.
 */
export function loadConfig(argv: string[] = process.argv, env: Env = process.env): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : (envValue === 'false' ? false : defaultValue);
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    const value = typeof cliValue === 'string' ? cliValue : env[envKey];
    return value === undefined || value === '' ? defaultValue : Number(value);
  };

  const getStringArray = (cliKey: string, envKey: string, defaultValue: string[]): string[] => {
    const value = cliArgs[cliKey] || env[envKey];
    if (!value) return defaultValue;
    return String(value).split(',').map(s => s.trim()).filter(s => s.length > 0);
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'music-track-generator'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    http: {
      host: getString('host', 'HOST', '0.0.0.0'),
      port: getNumber('port', 'PORT', 8000),
      corsOrigins: getStringArray('cors-origins', 'CORS_ORIGINS', ['*']),
      webSocket: getBoolean('web-socket', 'WEB_SOCKET_ENABLED', true),
    },
    generation: {
      downloadsDir: getString('downloads-dir', 'DOWNLOADS_DIR', 'downloads'),
      timeScale: getNumber('time-scale', 'SIMULATION_TIME_SCALE', 1),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration for the running process; exits on invalid settings
 */
export function getConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach(err => {
        const path = err.path.join('.');
        console.error(`  • ${path || 'root'}: ${err.message}`);
      });
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - PORT must be an integer between 0 and 65535');
      console.error('  - SIMULATION_TIME_SCALE must be in (0, 10]');
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
  console.log('═'.repeat(68));
  console.log(`  ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.log('═'.repeat(68));

  console.log(`\n🌐 HTTP: http://${config.http.host}:${config.http.port}`);
  console.log(`   CORS origins: ${config.http.corsOrigins.join(', ')}`);
  console.log(`   WebSocket updates: ${config.http.webSocket ? 'enabled' : 'disabled'}`);

  console.log(`\n🎵 Downloads: ${config.generation.downloadsDir}`);
  if (config.generation.timeScale !== 1) {
    console.log(`⏱️  Simulation time scale: ${config.generation.timeScale}x`);
  }

  console.log('\n' + '─'.repeat(68));
}
