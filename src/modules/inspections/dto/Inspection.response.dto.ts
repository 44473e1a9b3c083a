import type { Inspection } from '../inspections.types';

export interface InspectionDto {
  id: string;
  hiveId: string;
  scheduledFor: string;
  notes: string | null;
  createdAt: string;
}

export interface CreateInspectionResponseDto {
  success: true;
  inspection: InspectionDto;
}

export interface GetInspectionResponseDto {
  success: true;
  inspection: InspectionDto;
}

export interface ListInspectionsResponseDto {
  success: true;
  inspections: InspectionDto[];
}

export function toInspectionDto(inspection: Inspection): InspectionDto {
  return {
    id: inspection.id,
    hiveId: inspection.hiveId,
    scheduledFor: inspection.scheduledFor,
    notes: inspection.notes,
    createdAt: inspection.createdAt.toISOString(),
  };
}
