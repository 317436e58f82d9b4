import type { RegisteredHandler } from './types';
import { registration } from './types';
import { SummarySchema, DiffSchema } from './schemas/structureSchemas';
import { SmellsSchema, SecuritySchema, MetricsSchema } from './schemas/scanSchemas';
import { CheckSchema } from './schemas/checkSchemas';
import { handleSummary, handleDiff } from './handlers/structureHandlers';
import { handleSmells, handleSecurity, handleMetrics } from './handlers/scanHandlers';
import { handleCheck } from './handlers/checkHandlers';

/**
 * Registry of all CLI command handlers
 *
 * Maps command keys to their schema + handler implementations.
 */
export const cliHandlers: Record<string, RegisteredHandler | undefined> = {
  'summary': registration(SummarySchema, handleSummary),
  'diff': registration(DiffSchema, handleDiff),
  'smells': registration(SmellsSchema, handleSmells),
  'security': registration(SecuritySchema, handleSecurity),
  'metrics': registration(MetricsSchema, handleMetrics),
  'check': registration(CheckSchema, handleCheck),
};
