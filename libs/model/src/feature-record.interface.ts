/**
 * Input features accepted by the admissions model, in the column order the
 * model was trained on.
 */
export const FEATURE_NAMES = [
  'GRE_Score',
  'TOEFL_Score',
  'University_Rating',
  'SOP',
  'LOR',
  'CGPA',
  'Research',
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

/**
 * One applicant's profile. Field names are the public wire names.
 *
 * Bounds are enforced at the HTTP boundary (FeatureRecordDto); adapters may
 * assume a record they receive is already in range.
 */
export interface FeatureRecord {
  /** GRE score, integer 0–340 */
  GRE_Score: number;

  /** TOEFL score, integer 0–120 */
  TOEFL_Score: number;

  /** University rating, integer 1–5 */
  University_Rating: number;

  /** Statement of purpose strength, 1–5 */
  SOP: number;

  /** Letter of recommendation strength, 1–5 */
  LOR: number;

  /** Undergraduate CGPA, 0–10 */
  CGPA: number;

  /** Research experience, 0 or 1 */
  Research: number;
}
