import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { Injectable, Logger } from '@nestjs/common';

@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly envConfig: Record<string, string>;

  constructor() {
    // Try to load from .env file first
    const envFile = process.env.NODE_ENV === 'production'
      ? '.env.production'
      : '.env.development';

    try {
      this.envConfig = { ...ConfigService.fromProcessEnv(), ...dotenv.parse(fs.readFileSync(envFile)) };
    } catch (err) {
      this.logger.warn(`Failed to load ${envFile} (${err instanceof Error ? err.message : String(err)}), using process.env`);
      this.envConfig = ConfigService.fromProcessEnv();
    }
  }

  private static fromProcessEnv(): Record<string, string> {
    return Object.fromEntries(
      Object.entries(process.env).filter((entry): entry is [string, string] => entry[1] !== undefined),
    );
  }

  get(key: string): string {
    const value = this.envConfig[key];
    if (value === undefined) {
      throw new Error(`Configuration error: Missing required environment variable ${key}`);
    }
    return value;
  }

  getOrDefault(key: string, fallback: string): string {
    return this.envConfig[key] ?? fallback;
  }

  getNumber(key: string, fallback: number): number {
    const parsed = Number.parseInt(this.getOrDefault(key, ''), 10);
    return Number.isNaN(parsed) ? fallback : parsed;
  }
}
