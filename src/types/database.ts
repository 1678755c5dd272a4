/**
 * Database row types, mirroring the table schemas.
 * Kept separate so the database can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

export interface EpisodeRow {
  id: string;
  timestamp: string;
  text: string;
  source_type: string;
  provenance_ref: string;
  created_at: string;
}

