/**
 * Table layout for the casefile database.
 *
 * `TableColumns` is the compile-time view used by the generic store;
 * `TABLE_COLUMNS` is the runtime list the store checks field names against.
 */

export type SqlValue = string | number | null;

export type SubjectColumns = {
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
  sanctions_checked: number;
  sanctions_hits: string | null;
  risk_level: string;
  risk_indicators: string | null;
  status: string;
  notes: string | null;
  created_at: string;
  updated_at: string | null;
};

export type TwitterAccountColumns = {
  username: string;
  display_name: string | null;
  description: string | null;
  category: string | null;
  is_active: number;
  created_at: string;
  updated_at: string | null;
};

export type NewsSourceColumns = {
  name: string;
  url: string;
  description: string | null;
  category: string | null;
  language: string;
  is_active: number;
  created_at: string;
  updated_at: string | null;
};

export type FindingColumns = {
  title: string;
  finding_type: string | null;
  description: string | null;
  source_url: string | null;
  source_name: string | null;
  subject_id: number | null;
  tags: string | null;
  importance: string;
  verified: number;
  notes: string | null;
  created_at: string;
  updated_at: string | null;
};

export type UserContactColumns = {
  name: string;
  contact_type: string | null;
  email: string | null;
  phone: string | null;
  url: string | null;
  description: string | null;
  notes: string | null;
  created_at: string;
};

export type TableColumns = {
  subjects: SubjectColumns;
  twitter_accounts: TwitterAccountColumns;
  news_sources: NewsSourceColumns;
  findings: FindingColumns;
  user_contacts: UserContactColumns;
};

export type TableName = keyof TableColumns;

export const TABLE_COLUMNS: { [T in TableName]: ReadonlyArray<keyof TableColumns[T]> } = {
  subjects: [
    'name_en',
    'name_fa',
    'aliases',
    'location_spotted',
    'country',
    'event_description',
    'linkedin_url',
    'linkedin_headline',
    'linkedin_companies',
    'linkedin_education',
    'twitter_url',
    'sanctions_checked',
    'sanctions_hits',
    'risk_level',
    'risk_indicators',
    'status',
    'notes',
    'created_at',
    'updated_at',
  ],
  twitter_accounts: [
    'username',
    'display_name',
    'description',
    'category',
    'is_active',
    'created_at',
    'updated_at',
  ],
  news_sources: [
    'name',
    'url',
    'description',
    'category',
    'language',
    'is_active',
    'created_at',
    'updated_at',
  ],
  findings: [
    'title',
    'finding_type',
    'description',
    'source_url',
    'source_name',
    'subject_id',
    'tags',
    'importance',
    'verified',
    'notes',
    'created_at',
    'updated_at',
  ],
  user_contacts: [
    'name',
    'contact_type',
    'email',
    'phone',
    'url',
    'description',
    'notes',
    'created_at',
  ],
};

// findings.subject_id is deliberately not a FOREIGN KEY: subjects can be
// deleted while findings keep pointing at them.
export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS subjects (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name_en TEXT NOT NULL,
    name_fa TEXT,
    aliases TEXT,
    location_spotted TEXT,
    country TEXT,
    event_description TEXT,
    linkedin_url TEXT,
    linkedin_headline TEXT,
    linkedin_companies TEXT,
    linkedin_education TEXT,
    twitter_url TEXT,
    sanctions_checked INTEGER NOT NULL DEFAULT 0,
    sanctions_hits TEXT,
    risk_level TEXT NOT NULL DEFAULT 'Unknown',
    risk_indicators TEXT,
    status TEXT NOT NULL DEFAULT 'New',
    notes TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT
  );

  CREATE TABLE IF NOT EXISTS twitter_accounts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL UNIQUE,
    display_name TEXT,
    description TEXT,
    category TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    updated_at TEXT
  );

  CREATE TABLE IF NOT EXISTS news_sources (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    url TEXT NOT NULL UNIQUE,
    description TEXT,
    category TEXT,
    language TEXT NOT NULL DEFAULT 'en',
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    updated_at TEXT
  );

  CREATE TABLE IF NOT EXISTS findings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    finding_type TEXT,
    description TEXT,
    source_url TEXT,
    source_name TEXT,
    subject_id INTEGER,
    tags TEXT,
    importance TEXT NOT NULL DEFAULT 'Medium',
    verified INTEGER NOT NULL DEFAULT 0,
    notes TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT
  );

  CREATE TABLE IF NOT EXISTS user_contacts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    contact_type TEXT,
    email TEXT,
    phone TEXT,
    url TEXT,
    description TEXT,
    notes TEXT,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_subjects_created ON subjects(created_at);
  CREATE INDEX IF NOT EXISTS idx_subjects_status ON subjects(status);
  CREATE INDEX IF NOT EXISTS idx_findings_subject ON findings(subject_id);
  CREATE INDEX IF NOT EXISTS idx_findings_created ON findings(created_at);
`;
