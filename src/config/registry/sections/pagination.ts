import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const paginationSection = {
  name: 'pagination',
  description: 'List query limits.',
  options: {
    defaultLimit: {
      envKey: 'FOTOREPORT_DEFAULT_LIMIT',
      defaultValue: 20,
      description: 'Rows returned by list queries when no limit is given.',
      schema: z.number().int().positive(),
      parse: 'int',
    },
    maxLimit: {
      envKey: 'FOTOREPORT_MAX_LIMIT',
      defaultValue: 100,
      description: 'Upper bound applied to any requested limit.',
      schema: z.number().int().positive(),
      parse: 'int',
    },
  },
} satisfies ConfigSectionMeta;
