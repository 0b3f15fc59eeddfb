// ============================================================
// Signal Filter Policy Defaults
// ============================================================

export interface FilterPolicy {
  /** Minimum total score for any direction */
  minScore: number;
  /** Stricter floor for BUY signals */
  buyMinScore: number;
  /** Stricter floor for SELL signals */
  sellMinScore: number;
}

export const DEFAULT_FILTER_POLICY: Readonly<FilterPolicy> = {
  minScore: 40,
  buyMinScore: 50,
  sellMinScore: 70,
};
