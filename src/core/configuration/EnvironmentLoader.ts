// src/core/configuration/EnvironmentLoader.ts

import * as fs from 'fs';
import * as path from 'path';
import dotenv from 'dotenv';
import { ConfigMap } from './types/config.types';
import { logger } from '../utils/Logger';

export interface LoadedEnvFile {
  file: string;
  values: ConfigMap;
}

export class EnvironmentLoader {
  private readonly envDir = 'environments';

  constructor(private readonly configDir: string = path.join(process.cwd(), 'config')) {}

  getConfigDir(): string {
    return this.configDir;
  }

  /**
   * `global.env` first, then every other `*.env` in the config directory in
   * name order, so later files win.
   */
  async loadGlobalConfig(): Promise<LoadedEnvFile[]> {
    const loaded: LoadedEnvFile[] = [];

    if (!fs.existsSync(this.configDir)) {
      logger.debug(`Config directory not found: ${this.configDir}`);
      return loaded;
    }

    const globalEnvPath = path.join(this.configDir, 'global.env');
    if (fs.existsSync(globalEnvPath)) {
      loaded.push({ file: globalEnvPath, values: dotenv.parse(await fs.promises.readFile(globalEnvPath)) });
      logger.debug('Loaded global.env configuration');
    }

    const configFiles = (await fs.promises.readdir(this.configDir))
      .filter(file => file.endsWith('.env') && file !== 'global.env')
      .sort();

    for (const file of configFiles) {
      const envPath = path.join(this.configDir, file);
      loaded.push({ file: envPath, values: dotenv.parse(await fs.promises.readFile(envPath)) });
      logger.debug(`Loaded ${file} configuration`);
    }

    return loaded;
  }

  async loadEnvironmentFile(environment: string): Promise<LoadedEnvFile | null> {
    const envPath = path.join(this.configDir, this.envDir, `${environment}.env`);
    if (!fs.existsSync(envPath)) {
      logger.debug(`No environment file for '${environment}' at ${envPath}`);
      return null;
    }

    logger.debug(`Loaded ${environment}.env configuration`);
    return { file: envPath, values: dotenv.parse(await fs.promises.readFile(envPath)) };
  }
}
