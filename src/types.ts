// Core enumerations
export type SubjectStatus = 'New' | 'Investigating' | 'Verified';

export type RiskLevel = 'Unknown' | 'Low' | 'Medium' | 'High' | 'Critical';

export type Importance = 'Low' | 'Medium' | 'High' | 'Critical';

// API types
export interface Subject {
  id: number;
  name_en: string;
  name_fa: string | null;
  aliases: string | null;
  location_spotted: string | null;
  country: string | null;
  event_description: string | null;
  linkedin_url: string | null;
  linkedin_headline: string | null;
  linkedin_companies: string | null;
  linkedin_education: string | null;
  twitter_url: string | null;
  sanctions_checked: boolean;
  sanctions_hits: string | null;
  // Free-form on update; new subjects default to 'Unknown' / 'New'
  risk_level: string;
  risk_indicators: string | null;
  status: string;
  notes: string | null;
  created_at: string;
  updated_at: string | null;
}

export interface TwitterAccount {
  id: number;
  username: string;
  display_name: string | null;
  description: string | null;
  category: string | null;
  is_active: boolean;
  created_at: string;
  updated_at: string | null;
}

export interface NewsSource {
  id: number;
  name: string;
  url: string;
  description: string | null;
  category: string | null;
  language: string;
  is_active: boolean;
  created_at: string;
  updated_at: string | null;
}

export interface Finding {
  id: number;
  title: string;
  finding_type: string | null;
  description: string | null;
  source_url: string | null;
  source_name: string | null;
  subject_id: number | null;
  /** name_en of the referenced subject, null when unset or dangling */
  subject_name: string | null;
  tags: string | null;
  importance: string;
  verified: boolean;
  notes: string | null;
  created_at: string;
  updated_at: string | null;
}

export interface UserContact {
  id: number;
  name: string;
  contact_type: string | null;
  email: string | null;
  phone: string | null;
  url: string | null;
  description: string | null;
  notes: string | null;
  created_at: string;
}

export interface PresetContact {
  name: string;
  type: string;
  contact: string;
  url: string;
  description: string;
}

export interface SubjectStatistics {
  total: number;
  by_status: Record<string, number>;
  by_risk: Record<string, number>;
}

export type SearchUrls = Record<string, Record<string, string>>;

// Database row types (internal - match SQLite column names)
export interface SubjectRow extends Omit<Subject, 'sanctions_checked'> {
  sanctions_checked: number;
}

export interface TwitterAccountRow extends Omit<TwitterAccount, 'is_active'> {
  is_active: number;
}

export interface NewsSourceRow extends Omit<NewsSource, 'is_active'> {
  is_active: number;
}

export interface FindingRow extends Omit<Finding, 'verified'> {
  verified: number;
}

export type UserContactRow = UserContact;

// Constants
export const SUBJECT_STATUSES: readonly SubjectStatus[] = [
  'New', 'Investigating', 'Verified'
] as const;

export const RISK_LEVELS: readonly RiskLevel[] = [
  'Unknown', 'Low', 'Medium', 'High', 'Critical'
] as const;
