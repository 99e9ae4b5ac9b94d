/**
 * Serialized report shapes. Field names follow the published JSON format.
 */

export interface ISerializedWhois {
  registrar: string | null;
  creation_date: string | null;
  expiration_date: string | null;
  name_servers: string[];
  registrant: string | null;
  registrant_email: string | null;
}

export interface ISerializedRecommendation {
  score: number;
  reason: string;
  estimated_value: string;
}

export interface ISerializedCheckResult {
  domain: string;
  years_popular: number[];
  status: string;
  http_status_code: number | null;
  redirect_url: string | null;
  page_title: string | null;
  is_parked: boolean;
  is_for_sale: boolean;
  sale_platform: string | null;
  /** Why the HTTP probe got no response, null when it got one */
  probe_error: string | null;
  whois: ISerializedWhois;
  recommendation: ISerializedRecommendation;
  checked_at: string;
}

/**
 * Count of results per status, including "error" and "unknown"
 */
export type StatusSummary = Record<string, number>;

export interface IReport {
  generated_at: string;
  total_domains: number;
  summary: StatusSummary;
  results: ISerializedCheckResult[];
}
