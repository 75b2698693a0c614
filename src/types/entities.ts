// Core entity types for the database schema

export type FileAction = 'created' | 'modified' | 'deleted' | 'read';

export type KnowledgeCategory = 'pattern' | 'solution' | 'gotcha' | 'preference';

export type EntityType = 'person' | 'project' | 'technology' | 'file' | 'concept';

/**
 * Schema-less attachment stored as JSON text. Opaque to the core.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface Session {
  id: string;
  tool: string;
  start_time: string;
  end_time: string | null;
  working_dir: string;
  project_path: string;
  git_repo: string | null;
  git_branch: string | null;
  git_commit: string | null;
  exit_code: number | null;
  duration_seconds: number | null;
  created_at: string;
  updated_at: string;
}

export interface SessionFile {
  id: string;
  session_id: string;
  file_path: string;
  action: FileAction;
  language: string | null;
  lines_added: number;
  lines_removed: number;
  orphaned: number;
  timestamp: string;
}

export interface SessionCommand {
  id: string;
  session_id: string;
  command: string;
  exit_code: number | null;
  output_summary: string | null;
  orphaned: number;
  timestamp: string;
}

export interface SessionContextEvent {
  id: string;
  session_id: string;
  context_type: string;
  context_data: JsonValue;
  orphaned: number;
  timestamp: string;
}

export interface KnowledgeEntry {
  id: string;
  category: KnowledgeCategory;
  title: string;
  description: string;
  context: JsonValue | null;
  frequency: number;
  last_used: string | null;
  source_sessions: string[];
  created_at: string;
  updated_at: string;
}

export interface Project {
  id: string;
  project_path: string;
  project_name: string | null;
  primary_language: string | null;
  framework: string | null;
  last_session_id: string | null;
  session_count: number;
  total_time_seconds: number;
  created_at: string;
  updated_at: string;
}

export interface ProjectPattern {
  id: string;
  project_id: string;
  pattern_type: string;
  pattern_data: JsonValue;
  confidence: number;
  created_at: string;
  updated_at: string;
}

export interface WeeklySummaryData {
  branches_worked_on: string[];
  projects: string[];
  average_session_time: number;
  files_touched: number;
  commands_run: number;
  decisions: JsonValue[];
  solutions: JsonValue[];
  knowledge_touched: string[];
}

export interface WeeklySummary {
  id: string;
  year: number;
  week_number: number;
  cli_tool: string;
  /** null when the rollup covers every project */
  project_path: string | null;
  summary_data: WeeklySummaryData;
  session_count: number;
  total_time_seconds: number;
  created_at: string;
}

export interface Entity {
  id: string;
  entity_name: string;
  entity_type: EntityType;
  description: string | null;
  metadata: JsonValue | null;
  reference_count: number;
  last_referenced: string | null;
  created_at: string;
}

export interface EntityRelation {
  id: string;
  from_entity_id: string;
  to_entity_id: string;
  relation_type: string;
  strength: number;
  created_at: string;
  updated_at: string;
}

export interface ToolVersion {
  id: string;
  tool_name: string;
  version: string;
  previous_version: string | null;
  last_check: string;
  updated_at: string;
}

// Input types for creating/updating entities
export interface GitInfo {
  repo?: string | null;
  branch?: string | null;
  commit?: string | null;
}

export interface CreateSessionInput {
  tool: string;
  working_dir: string;
  project_path: string;
  git?: GitInfo;
  start_time: string;
}

export interface CreateFileActionInput {
  file_path: string;
  action: FileAction;
  language?: string | null;
  lines_added: number;
  lines_removed: number;
}

export interface CreateCommandInput {
  command: string;
  exit_code: number | null;
  output_summary?: string | null;
}

export interface CreateKnowledgeInput {
  category: KnowledgeCategory;
  title: string;
  description: string;
  context?: JsonValue | null;
  source_session_id?: string | null;
}

export interface ProjectProfileInput {
  name?: string;
  language?: string;
  framework?: string;
}

export interface RecentSession extends Session {
  files_modified: number;
  commands_run: number;
}

export interface ContextPayload {
  working_dir: string;
  tool: string | null;
  project: Project | null;
  recent_sessions: RecentSession[];
  project_patterns: ProjectPattern[];
  relevant_knowledge: KnowledgeEntry[];
}

export interface MemoryStats {
  by_tool: Record<string, { sessions: number; total_time: number }>;
  recent_activity: Array<{ date: string; sessions: number }>;
  top_projects: Array<{ path: string; name: string | null; sessions: number; time: number }>;
}
