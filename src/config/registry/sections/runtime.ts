import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';
import { getDataDir } from '../parsers.js';

export const runtimeSection = {
  name: 'runtime',
  description: 'Process environment.',
  options: {
    nodeEnv: {
      envKey: 'NODE_ENV',
      defaultValue: 'development',
      description: 'Node environment: development, production or test.',
      schema: z.string(),
    },
  },
} satisfies ConfigSectionMeta;

export const pathsSection = {
  name: 'paths',
  description: 'Filesystem locations.',
  options: {
    dataDir: {
      envKey: 'FOTOREPORT_DATA_DIR',
      defaultValue: 'data',
      description: 'Base directory for the SQLite database and other local files.',
      schema: z.string(),
      parse: () => getDataDir(),
    },
  },
} satisfies ConfigSectionMeta;
