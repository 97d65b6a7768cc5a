import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

export type EnvSource = Record<string, string | undefined>;

/**
 * Environment variable loader
 */
export class EnvLoader {
  private static initialized = false;

  /**
   * Load .env.local, then .env, from the working directory.
   * Variables already present in the process environment win.
   */
  public static initialize(cwd: string = process.cwd()): string[] {
    if (this.initialized) {
      return [];
    }

    const loaded: string[] = [];
    const envPaths = [
      path.join(cwd, '.env.local'),
      path.join(cwd, '.env')
    ];

    for (const envPath of envPaths) {
      if (!fs.existsSync(envPath)) {
        continue;
      }
      const result = dotenv.config({ path: envPath });
      if (result.error) {
        throw result.error;
      }
      loaded.push(envPath);
    }

    this.initialized = true;
    return loaded;
  }
}

/**
 * Typed reads over an environment map
 */
export class EnvReader {
  constructor(private readonly source: EnvSource = process.env) {}

  /**
   * Raw value; empty strings count as unset
   */
  public get(key: string): string | undefined;
  public get(key: string, defaultValue: string): string;
  public get(key: string, defaultValue?: string): string | undefined {
    const value = this.source[key];
    return value !== undefined && value !== '' ? value : defaultValue;
  }

  public has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  public getNumber(key: string, defaultValue: number): number {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    const num = Number.parseInt(value, 10);
    return Number.isNaN(num) ? defaultValue : num;
  }

  /**
   * Only "true" (any case) is true
   */
  public getBoolean(key: string, defaultValue = false): boolean {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true';
  }

  public getArray(key: string, defaultValue: string[] = []): string[] {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  }
}
