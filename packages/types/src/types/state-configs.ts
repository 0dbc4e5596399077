import { z } from 'zod/v4';
import { StateConfigFileSchema, StateConfigSchema } from '../schemas/index.js';

export type StateConfigFile = z.input<typeof StateConfigFileSchema>;
export type StateConfig = z.infer<typeof StateConfigSchema>;
