import type { TrafficsmithConfig } from '../types/index.js';

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: TrafficsmithConfig = {
  port: 3001,
  storage: {
    type: 'lowdb',
    path: './.trafficsmith/rules.json',
  },
  rules: {
    watch: false,
  },
  model: {
    ignoreHeaders: [
      'cookie',
      'set-cookie',
      'x-request-id',
      'x-correlation-id',
      'date',
      'user-agent',
      'host',
      'content-length',
      'connection',
      'accept-encoding',
      'keep-alive',
      'etag',
      'last-modified',
    ],
    varianceThreshold: 5,
  },
  logging: {
    level: 'info',
  },
  output: {
    dir: './trafficsmith-out',
  },
};

/**
 * Default config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  'trafficsmith.config.yml',
  'trafficsmith.config.yaml',
  'trafficsmith.yml',
  'trafficsmith.yaml',
  '.trafficsmithrc.yml',
  '.trafficsmithrc.yaml',
];
