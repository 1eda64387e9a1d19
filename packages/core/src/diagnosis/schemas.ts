/**
 * @module diagnosis/schemas
 * Zod schemas for diagnosis requests.
 */

import { z } from 'zod';

export const DiagnoseRequestSchema = z.object({
  name: z.string().describe('Car make/brand'),
  model: z.string().describe('Car model + year'),
  fault_code: z.string().nullable().optional().describe('OBD-II fault code like P0300'),
  description: z.string().describe('Description of the problem'),
}).describe('Diagnosis request body');

export type DiagnoseRequest = z.infer<typeof DiagnoseRequestSchema>;

