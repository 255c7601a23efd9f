import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

/**
 * Loads `.env`, `.env.local`, `.env.{NODE_ENV}` and `.env.{NODE_ENV}.local`
 * from `cwd`, in that order. Variables already in the process environment win.
 */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  const env = (process.env.NODE_ENV || 'development').trim();
  const candidates = ['.env', '.env.local', `.env.${env}`, `.env.${env}.local`].map((name) =>
    path.join(cwd, name),
  );

  for (const file of candidates) {
    if (!fs.existsSync(file)) continue;
    dotenv.config({ path: file, override: false });
  }
}
