/**
 * Configuration management
 */

import * as dotenv from 'dotenv';
import { AppConfig } from './types';
import { CONSTANTS } from './constants';

dotenv.config();

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config: AppConfig = {
    exportDir: env.EXPORT_DIR || './exports',
    largeProjectThreshold: parseInt(
      env.LARGE_PROJECT_THRESHOLD || String(CONSTANTS.LARGE_PROJECT_THRESHOLD),
      10
    ),
    defaultAuthor: env.DEFAULT_AUTHOR || '',
    verbose: env.VERBOSE === 'true',
  };

  // Validate numeric settings
  const problems: string[] = [];
  if (!Number.isFinite(config.largeProjectThreshold) || config.largeProjectThreshold <= 0) {
    problems.push('LARGE_PROJECT_THRESHOLD');
  }

  if (problems.length > 0) {
    throw new Error(
      `Invalid environment variables: ${problems.join(', ')}\n` +
      'Please check your .env file.'
    );
  }

  return config;
}

export function displayConfig(config: AppConfig): void {
  console.log('\nConfiguration:');
  console.log(`  Export directory: ${config.exportDir}`);
  console.log(`  Large project threshold: ${config.largeProjectThreshold} items`);
  console.log(`  Default author: ${config.defaultAuthor || '(none)'}`);
  console.log(`  Verbose: ${config.verbose}`);
  console.log('');
}
