import { z } from 'zod/v4';
import { TaxFieldSchema, TaxTypeSchema } from '../schemas/index.js';

export type TaxField = z.infer<typeof TaxFieldSchema>;
export type TaxType = z.infer<typeof TaxTypeSchema>;
