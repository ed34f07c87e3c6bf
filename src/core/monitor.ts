/**
 * Token aging thresholds
 *
 * Upstream sessions last roughly three months. Past 60 days the operator is
 * told to plan a re-login; past 90 days it is critical.
 */

import type { TokenAgeSeverity } from './types.js';

export const TOKEN_AGE_WARNING_DAYS = 60;
export const TOKEN_AGE_CRITICAL_DAYS = 90;

export function assessTokenAge(ageDays: number | undefined): TokenAgeSeverity {
  if (ageDays === undefined) {
    return 'ok';
  }
  if (ageDays > TOKEN_AGE_CRITICAL_DAYS) {
    return 'critical';
  }
  if (ageDays > TOKEN_AGE_WARNING_DAYS) {
    return 'warning';
  }
  return 'ok';
}
