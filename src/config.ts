import dotenv from 'dotenv';

// .env.local имеет приоритет над .env
dotenv.config({ path: '.env.local' });
dotenv.config();

export interface AppConfig {
  downloadDir: string;
  logLevel: string;
  /** Журнал в файл (JSON), только если задан */
  logFilePath?: string;
  nodeEnv: string;
}

const config: AppConfig = {
  downloadDir: process.env.DOWNLOAD_DIR || 'downloads',
  logLevel: process.env.LOG_LEVEL || 'info',
  logFilePath: process.env.LOG_FILE_PATH || undefined,
  nodeEnv: process.env.NODE_ENV || 'development',
};

export default config;
