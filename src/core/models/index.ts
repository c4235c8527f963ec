/**
 * Core Domain Models - Barrel Export
 *
 * Pure types shared by the session store, the answer service, storage and
 * the API layer. No runtime dependencies.
 *
 * @example
 * ```typescript
 * import type { Session, Turn } from '@/core/models';
 * ```
 */

export type { Turn, Session, SessionSummary } from './session';
