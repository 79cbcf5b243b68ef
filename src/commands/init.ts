import { join } from 'path';
import { existsSync, writeFileSync } from 'fs';
import { CONFIG_FILENAME, saveConfig } from '../services/config.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const ENV_TEMPLATE = `LINKEDIN_ACCESS_TOKEN=
ANTHROPIC_API_KEY=
PORT=5000
HOST=0.0.0.0
SEOPOST_DEBUG=false
`;

export async function initCommand(): Promise<void> {
  const cwd = process.cwd();
  const configPath = join(cwd, CONFIG_FILENAME);

  if (existsSync(configPath)) {
    logger.error(`Already initialized! ${CONFIG_FILENAME} exists in this directory.`);
    process.exit(1);
  }

  try {
    saveConfig(DEFAULT_CONFIG, cwd);
    logger.success(`Created configuration: ${CONFIG_FILENAME}`);

    const envPath = join(cwd, '.env');
    if (!existsSync(envPath)) {
      writeFileSync(envPath, ENV_TEMPLATE, 'utf-8');
      logger.success('Created file: .env');
    }

    logger.blank();
    logger.info('seopost initialized successfully!');
    logger.blank();
    logger.info('Next steps:');
    logger.info('1. Put your LinkedIn access token in .env (scopes: openid, profile, w_member_social)');
    logger.info(`2. Edit ${CONFIG_FILENAME} to set your profile and LLM provider`);
    logger.info('3. Run: seopost post       # publish one post now');
    logger.info('4. Run: seopost schedule   # publish every day');
  } catch (error) {
    logger.error(`Initialization failed: ${errorMessage(error)}`);
    process.exit(1);
  }
}
