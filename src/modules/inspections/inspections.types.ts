import type { CreationResult } from '../../lib/creation/creation-result';
import type { InspectionCreationErrorKind } from '../../lib/creation/creation-status';

export interface Inspection {
  readonly id: string;
  readonly hiveId: string;
  /** Calendar day, `YYYY-MM-DD`. */
  readonly scheduledFor: string;
  readonly notes: string | null;
  readonly createdAt: Date;
}

export type InspectionDraft = Omit<Inspection, 'id'>;

export interface InspectionCreationInput {
  readonly hiveId: string;
  readonly scheduledFor: string;
  readonly notes?: string | null;
}

export type InspectionCreationResult = CreationResult<
  Inspection,
  InspectionCreationErrorKind
>;
