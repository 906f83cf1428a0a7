/**
 * Resume Optimizer Types
 *
 * Data model shared by every pipeline stage. Entities are created fresh per
 * run and serialized once into the run directory.
 */

// ============================================================================
// Profile
// ============================================================================

export type SourceName = 'github' | 'scholar' | 'linkedin';

export type ProvenanceKind =
  | 'repository'
  | 'language-summary'
  | 'publication'
  | 'research-summary'
  | 'position'
  | 'education'
  | 'skill-list';

/**
 * Where a capability statement came from
 */
export interface Provenance {
  kind: ProvenanceKind;
  reference: string; // repository name, publication title, company...
  url?: string;
}

/**
 * A normalized sentence describing a skill or experience
 */
export interface CapabilityStatement {
  id: string;
  text: string;
  skill?: string;
  source: SourceName;
  provenance: Provenance;
}

export interface SourceReport {
  source: SourceName;
  status: 'ok' | 'failed' | 'skipped';
  statementCount: number;
  error?: string;
}

export interface RepositorySummary {
  name: string;
  description?: string;
  language?: string;
  url: string;
  stars: number;
  topics: string[];
  readmeBullets: string[];
}

export interface GitHubProfileData {
  username: string;
  repositories: RepositorySummary[];
  languages: Record<string, number>;
}

export interface Publication {
  title: string;
  venue?: string;
  year?: number;
  citations: number;
  url?: string;
}

export interface ScholarProfileData {
  profileId: string;
  name?: string;
  interests: string[];
  publications: Publication[];
}

export interface LinkedInPosition {
  title: string;
  company: string;
  description?: string;
}

export interface LinkedInProfileData {
  profileUrl: string;
  name?: string;
  headline?: string;
  positions: LinkedInPosition[];
  education: string[];
  skills: string[];
}

/**
 * Raw per-source data kept alongside the statements for the analyzer
 */
export interface RawProfile {
  github?: GitHubProfileData;
  scholar?: ScholarProfileData;
  linkedin?: LinkedInProfileData;
}

export interface Profile {
  statements: CapabilityStatement[];
  sources: SourceReport[];
  raw: RawProfile;
  ingestedAt: string;
}

/**
 * Structured capability summary produced by the profile analyzer
 */
export interface CapabilitySummary {
  coreSkills: string[];
  technologies: string[];
  experiences: string[];
  projects: string[];
  achievements: string[];
  domainExpertise: string[];
  education: string;
}

export type ReviewAction = 'EMPHASIZE' | 'ADD' | 'REWRITE';

export interface ReviewRecommendation {
  action: ReviewAction;
  topic: string;
  evidence: string;
  suggestion: string;
}

/**
 * LLM comparison of the capability summary with the job (informational)
 */
export interface ProfileReview {
  strengths: string[];
  missingSkills: string[];
  recommendations: ReviewRecommendation[];
  llmMatchScore: number;
}

// ============================================================================
// Job
// ============================================================================

export type RequirementKind = 'required' | 'preferred';

export interface JobRequirement {
  id: string;
  text: string;
  skill: string;
  kind: RequirementKind;
  keywords: string[];
  sourceText: string;
}

export type ExtractionMethod = 'text' | `site:${string}` | 'generic' | 'body';

export interface JobPosting {
  role: string;
  company?: string;
  location?: string;
  experienceLevel?: string;
  education?: string;
  responsibilities: string[];
  keywords: string[];
  requirements: JobRequirement[];
  rawText: string;
  sourceUrl?: string;
  extraction: ExtractionMethod;
}

// ============================================================================
// Resume
// ============================================================================

export type BulletStyle = 'item' | 'resumeItem' | 'dash';

export interface ResumeBullet {
  id: string;
  text: string; // cleaned, plain text
  rawText: string; // markup as it appears in the document
  section: string;
  subsection?: string;
  style: BulletStyle;
  span: { start: number; end: number }; // offsets of rawText in the document
}

// ============================================================================
// Alignment
// ============================================================================

export const BULLET_DECISIONS = ['KEEP', 'REWRITE', 'ADD', 'DE_EMPHASIZE'] as const;

export type BulletDecision = (typeof BULLET_DECISIONS)[number];

export interface EvidenceRef {
  statementId: string;
  text: string;
  source: SourceName;
  similarity: number;
}

export interface DecisionRecord {
  decision: BulletDecision;
  bulletId?: string; // absent for ADD
  anchorBulletId?: string; // ADD only: inserted after this bullet
  originalText?: string;
  section?: string;
  requirementId?: string;
  requirementText?: string;
  similarity: number;
  evidence: EvidenceRef[];
  reason: string;
  rewrittenText?: string;
}

export interface MatchResult {
  subject: 'bullet' | 'capability';
  subjectId: string;
  subjectText: string;
  requirementId: string;
  requirementText: string;
  similarity: number;
  justification: string;
}

export interface AlignmentThresholds {
  keep: number;
  rewrite: number;
  evidence: number;
  keywordCoverage: number;
}

export interface AlignmentReport {
  matchScore: number;
  matches: MatchResult[];
  decisions: DecisionRecord[];
  recommendations: string[];
}

// ============================================================================
// Run
// ============================================================================

export interface AnalysisResult {
  runId: string;
  createdAt: string;
  matchScore: number;
  job: {
    role: string;
    company?: string;
    location?: string;
    sourceUrl?: string;
    extraction: ExtractionMethod;
    requirementCount: number;
  };
  profile: {
    statementCount: number;
    sources: SourceReport[];
    summary: CapabilitySummary;
  };
  resume: {
    fileName: string;
    bulletCount: number;
  };
  matches: MatchResult[];
  decisions: DecisionRecord[];
  recommendations: string[];
  profileReview?: ProfileReview;
  index: {
    profileGeneration: number;
    profileFingerprint: string;
    reusedSnapshot: boolean;
  };
}

export interface PublishResult {
  commitSha: string;
  htmlUrl?: string;
  path: string;
  branch: string;
  created: boolean;
}
