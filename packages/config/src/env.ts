/**
 * Centralized environment variable loader
 * 
 * Locates repo root and loads .env file deterministically.
 * Provides diagnostics and validation without logging secrets.
 */

import { config } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { join, resolve, dirname } from 'path';

const ROOT_PACKAGE_NAME = 'rioplatense-translator';

export interface EnvDiagnostics {
  cwd: string;
  repoRoot: string;
  envFilePath: string;
  envFileExists: boolean;
  requiredKeys: Array<{ key: string; present: boolean; maskedValue?: string; length?: number; source?: string }>;
  warnings: string[];
}

export interface EnvInitResult {
  repoRoot: string;
  envFilePath: string;
  envLocalFilePath: string;
  loaded: boolean;
  localLoaded: boolean;
  keysLoaded: string[];
  keySources: Record<string, string>; // Maps key -> source file ('.env' or '.env.local')
}

function isWorkspaceRoot(packageJsonPath: string): boolean {
  try {
    const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof pkg !== 'object' || pkg === null) return false;
    return 'workspaces' in pkg || ('name' in pkg && pkg.name === ROOT_PACKAGE_NAME);
  } catch {
    // Unreadable package.json is not a root marker
    return false;
  }
}

/**
 * Find repository root by walking up from current directory
 */
export function findRepoRoot(startPath: string = process.cwd()): string {
  let current = resolve(startPath);
  const root = resolve('/');
  
  while (current !== root) {
    const packageJsonPath = join(current, 'package.json');
    if (existsSync(packageJsonPath) && isWorkspaceRoot(packageJsonPath)) {
      return current;
    }
    
    if (existsSync(join(current, '.git'))) {
      return current;
    }
    
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  
  // Fallback: return start path if nothing found
  return resolve(startPath);
}

/**
 * Mask sensitive values for logging
 */
function maskValue(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.substring(0, 4)}...${value.substring(value.length - 4)}`;
}

/**
 * Check if value contains unprintable characters (common Windows CRLF issues)
 */
function hasUnprintableChars(value: string): boolean {
  return /[\r\x00-\x08\x0B-\x0C\x0E-\x1F]/.test(value);
}

function isSecretKey(key: string): boolean {
  return key.includes('TOKEN') || key.includes('SECRET') || key.includes('PASSWORD') || key.includes('KEY');
}

// Guard to ensure dotenv is only loaded once
let cachedResult: EnvInitResult | null = null;

/**
 * Load one env file, returning the non-empty keys it provided
 */
function loadEnvFile(path: string): { loaded: boolean; keys: string[] } {
  const result = config({ path, override: true });
  const keys: string[] = [];
  if (result.parsed) {
    for (const key in result.parsed) {
      const envValue = result.parsed[key];
      if (envValue && envValue.trim().length > 0) {
        keys.push(key);
      }
    }
  }
  const loaded = !result.error || keys.length > 0;
  if (!loaded && result.error) {
    console.warn(`[env] Warning: Error loading ${path}: ${result.error.message}`);
  }
  return { loaded, keys };
}

/**
 * Initialize environment variables
 * Must be called before any code reads process.env
 * 
 * Loads from:
 * 1. <repo-root>/.env (always, if exists)
 * 2. <repo-root>/.env.local (if exists, overrides .env)
 * 
 * If an env var already exists and the file value is empty, the existing
 * value is kept.
 */
export function initEnv(envFileOverride?: string): EnvInitResult {
  if (cachedResult) {
    return cachedResult;
  }

  const repoRoot = findRepoRoot(process.cwd());
  const envFilePath = resolve(envFileOverride || process.env.ENV_FILE || join(repoRoot, '.env'));
  const envLocalFilePath = resolve(join(repoRoot, '.env.local'));
  
  const existingEnv: Record<string, string> = {};
  for (const key in process.env) {
    const value = process.env[key];
    if (value && value.trim().length > 0) {
      existingEnv[key] = value;
    }
  }
  
  const keysLoaded: string[] = [];
  const keySources: Record<string, string> = {};
  
  let loaded = false;
  if (existsSync(envFilePath)) {
    const result = loadEnvFile(envFilePath);
    loaded = result.loaded;
    for (const key of result.keys) {
      keysLoaded.push(key);
      keySources[key] = '.env';
    }
  } else {
    console.warn(`[env] .env file not found at: ${envFilePath}`);
  }
  
  let localLoaded = false;
  if (existsSync(envLocalFilePath)) {
    const result = loadEnvFile(envLocalFilePath);
    localLoaded = result.loaded;
    for (const key of result.keys) {
      keySources[key] = '.env.local';
      if (!keysLoaded.includes(key)) {
        keysLoaded.push(key);
      }
    }
  }
  
  // Restore existing non-empty values that a file blanked out
  for (const key in existingEnv) {
    const currentValue = process.env[key];
    if (!currentValue || currentValue.trim().length === 0) {
      process.env[key] = existingEnv[key];
    }
  }
  
  cachedResult = {
    repoRoot,
    envFilePath,
    envLocalFilePath,
    loaded,
    localLoaded,
    keysLoaded,
    keySources,
  };
  
  return cachedResult;
}

/**
 * Get environment diagnostics (safe for logging, no secrets)
 */
export function getEnvDiagnostics(requiredKeys: readonly string[]): EnvDiagnostics {
  const cwd = process.cwd();
  const repoRoot = findRepoRoot(cwd);
  const envFilePath = resolve(process.env.ENV_FILE || join(repoRoot, '.env'));
  const envFileExists = existsSync(envFilePath);
  const keySources = cachedResult?.keySources || {};
  
  const requiredKeysStatus = requiredKeys.map((key) => {
    const value = process.env[key];
    if (!value || value.trim().length === 0) {
      return { key, present: false };
    }
    return {
      key,
      present: true,
      length: value.trim().length,
      maskedValue: isSecretKey(key) ? maskValue(value) : undefined,
      source: keySources[key],
    };
  });
  
  const warnings: string[] = [];
  if (!envFileExists) {
    warnings.push(`.env file not found at: ${envFilePath}`);
  }
  for (const key of requiredKeys) {
    const value = process.env[key];
    if (value && hasUnprintableChars(value)) {
      warnings.push(`${key} contains unprintable characters (possible CRLF/encoding issue)`);
    }
  }
  
  return {
    cwd,
    repoRoot,
    envFilePath,
    envFileExists,
    requiredKeys: requiredKeysStatus,
    warnings,
  };
}

/**
 * Safe environment variable getter
 * 
 * @throws Error with clear message if missing or empty
 */
export function requireEnv(key: string): string {
  const value = process.env[key];
  
  if (!value || value.trim().length === 0) {
    const message = `Missing or empty required environment variable: ${key}\n` +
      `Please check your .env file and ensure ${key} is set with a non-empty value.`;
    throw new Error(message);
  }
  
  return value.trim();
}
