// ==========================================
// VC Records
// ==========================================

/** Placeholder the model writes for a field it could not find. */
export const NO_INFO = 'no info' as const;

export const VC_RECORD_FIELDS = ['vc_name', 'contacts', 'industries', 'investment_rounds'] as const;

export type VcRecordField = (typeof VC_RECORD_FIELDS)[number];

export type VcListField = Exclude<VcRecordField, 'vc_name'>;

export const VC_LIST_FIELDS: readonly VcListField[] = ['contacts', 'industries', 'investment_rounds'];

/**
 * Firm metadata extracted from a single website. List fields are never
 * scalars; a field with nothing found is `['no info']`.
 */
export type VcRecord = {
  vc_name: string;
  contacts: string[];
  industries: string[];
  investment_rounds: string[];
};

export interface SimilarFirm {
  vcName: string;
  score: number;
}

// ==========================================
// API Types
// ==========================================

export interface ProcessUrlRequest {
  url: string;
}

export interface ProcessUrlResponse {
  message: string;
  record: VcRecord;
  similar: SimilarFirm[];
  inserted: boolean;
  id: string | null;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}
