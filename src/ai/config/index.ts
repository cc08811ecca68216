/**
 * AI Model Configuration
 *
 * @example
 * import { getModel } from '../config';
 * const model = getModel('FACT_CHECKER');
 */

export * from './models';
