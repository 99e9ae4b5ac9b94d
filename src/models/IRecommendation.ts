/**
 * Acquisition recommendation for a domain
 */
export interface IRecommendation {
  /** Integer score in [1, 10] */
  score: number;
  /** Reasons joined with "; " in the order the scoring rules fired */
  reason: string;
  /** Dollar range keyed by score */
  estimatedValue: string;
}
