/**
 * Alignment Engine
 *
 * Decides what happens to every resume bullet and which requirements deserve
 * a new bullet, using three indexes built earlier in the run:
 *   - profile:      capability statements (the only source of evidence)
 *   - requirements: job requirements
 *   - bullets:      resume bullets
 *
 * Every similarity is an exact cosine in [0, 1], so decisions are a pure
 * function of index contents and thresholds.
 *
 * Decision rules, with s the bullet's best requirement similarity:
 *   s >= keep and keyword coverage met          -> KEEP
 *   s >= keep (low coverage), or s >= rewrite   -> REWRITE if evidence exists, else KEEP
 *   s <  rewrite                                -> DE_EMPHASIZE
 * A requirement no bullet reaches `rewrite` on becomes an ADD when the
 * profile holds a statement at or above `keep`.
 */

import { createComponentLogger } from '../../shared/logging/logger';
import type { EmbeddingHit, EmbeddingStore } from '../embeddings/embeddingStore';
import type { RunLog } from '../logging/runLog';
import { keywordCoverage } from '../parser/textNormalizer';
import type {
  AlignmentReport,
  AlignmentThresholds,
  CapabilityStatement,
  DecisionRecord,
  EvidenceRef,
  JobPosting,
  JobRequirement,
  MatchResult,
  ResumeBullet
} from '../types';

const log = createComponentLogger('alignment-engine');

const EVIDENCE_LIMIT = 3;

export const REQUIREMENT_WEIGHTS = {
  required: 1.0,
  preferred: 0.5
} as const;

export const NO_EVIDENCE_REASON = 'no profile evidence to support a rewrite';

export interface AlignmentInput {
  job: JobPosting;
  bullets: ResumeBullet[];
  profileIndex: EmbeddingStore<CapabilityStatement>;
  requirementIndex: EmbeddingStore<JobRequirement>;
  bulletIndex: EmbeddingStore<ResumeBullet>;
}

export interface AlignmentOptions {
  maxAdditions: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function clampUnit(value: number): number {
  return Math.max(0, Math.min(1, value));
}

function formatSimilarity(value: number): string {
  return value.toFixed(2);
}

function shorten(text: string, max = 80): string {
  return text.length <= max ? text : `${text.slice(0, max - 3)}...`;
}

function toEvidence(hit: EmbeddingHit<CapabilityStatement>): EvidenceRef {
  return {
    statementId: hit.metadata.id,
    text: hit.metadata.text,
    source: hit.metadata.source,
    similarity: round2(clampUnit(hit.similarity))
  };
}

/**
 * Union of evidence lists by statement, strongest first
 */
function mergeEvidence(...lists: EvidenceRef[][]): EvidenceRef[] {
  const byId = new Map<string, EvidenceRef>();
  for (const list of lists) {
    for (const ref of list) {
      const existing = byId.get(ref.statementId);
      if (!existing || ref.similarity > existing.similarity) {
        byId.set(ref.statementId, ref);
      }
    }
  }
  return [...byId.values()].sort((a, b) => b.similarity - a.similarity).slice(0, EVIDENCE_LIMIT);
}

function vectorFor<T>(store: EmbeddingStore<T>, text: string, kind: string): number[] {
  const vector = store.vectorOf(text);
  if (!vector) {
    throw new Error(`${kind} is not indexed: "${shorten(text)}"`);
  }
  return vector;
}

export interface RequirementCoverage {
  requirement: JobRequirement;
  bulletSimilarity: number;
  nearestBullet?: ResumeBullet;
  profileHits: Array<EmbeddingHit<CapabilityStatement>>;
  best: number;
}

export class AlignmentEngine {
  constructor(
    private readonly thresholds: AlignmentThresholds,
    private readonly options: AlignmentOptions,
    private readonly runLog?: RunLog
  ) {}

  align(input: AlignmentInput): AlignmentReport {
    const { job, bullets, profileIndex, requirementIndex, bulletIndex } = input;

    const bulletDecisions: DecisionRecord[] = [];
    const matches: MatchResult[] = [];

    for (const bullet of bullets) {
      const vector = vectorFor(bulletIndex, bullet.text, 'Bullet');
      const record = this.decideBullet(bullet, vector, requirementIndex, profileIndex);
      bulletDecisions.push(record);

      if (record.requirementId && record.requirementText) {
        matches.push({
          subject: 'bullet',
          subjectId: bullet.id,
          subjectText: bullet.text,
          requirementId: record.requirementId,
          requirementText: record.requirementText,
          similarity: record.similarity,
          justification: record.reason
        });
      }
    }

    const coverage = job.requirements.map(requirement =>
      this.measureRequirement(requirement, requirementIndex, bulletIndex, profileIndex)
    );

    for (const entry of coverage) {
      const top = entry.profileHits[0];
      if (!top) continue;
      matches.push({
        subject: 'capability',
        subjectId: top.metadata.id,
        subjectText: top.metadata.text,
        requirementId: entry.requirement.id,
        requirementText: entry.requirement.text,
        similarity: round2(clampUnit(top.similarity)),
        justification: `Strongest ${top.metadata.source} evidence for this requirement`
      });
    }

    const additions = this.proposeAdditions(coverage);
    const decisions = [...bulletDecisions, ...additions];
    decisions.forEach(record => this.runLog?.logDecision(record));

    const matchScore = this.computeScore(coverage);
    const recommendations = this.recommend(bulletDecisions, additions, coverage);

    log.info(
      {
        matchScore,
        keep: decisions.filter(record => record.decision === 'KEEP').length,
        rewrite: decisions.filter(record => record.decision === 'REWRITE').length,
        add: additions.length,
        deEmphasize: decisions.filter(record => record.decision === 'DE_EMPHASIZE').length
      },
      'Alignment complete'
    );

    return { matchScore, matches, decisions, recommendations };
  }

  /**
   * Weighted mean of each requirement's best similarity, as 0-100
   */
  computeScore(coverage: RequirementCoverage[]): number {
    let weighted = 0;
    let totalWeight = 0;
    for (const entry of coverage) {
      const weight = REQUIREMENT_WEIGHTS[entry.requirement.kind];
      weighted += weight * entry.best;
      totalWeight += weight;
    }
    if (totalWeight === 0) {
      return 0;
    }
    return Math.max(0, Math.min(100, round2((100 * weighted) / totalWeight)));
  }

  private decideBullet(
    bullet: ResumeBullet,
    vector: number[],
    requirementIndex: EmbeddingStore<JobRequirement>,
    profileIndex: EmbeddingStore<CapabilityStatement>
  ): DecisionRecord {
    const { keep, rewrite, evidence: evidenceThreshold } = this.thresholds;
    const [best] = requirementIndex.queryVector(vector, 1);
    const base = {
      bulletId: bullet.id,
      originalText: bullet.text,
      section: bullet.section
    };

    if (!best) {
      return { ...base, decision: 'DE_EMPHASIZE', similarity: 0, evidence: [], reason: 'No job requirement to match' };
    }

    const requirement = best.metadata;
    const raw = clampUnit(best.similarity);
    const similarity = round2(raw);
    const matched = { ...base, requirementId: requirement.id, requirementText: requirement.text, similarity };

    if (raw < rewrite) {
      return {
        ...matched,
        decision: 'DE_EMPHASIZE',
        evidence: [],
        reason: `Weak match (${formatSimilarity(similarity)}) with the closest requirement "${shorten(requirement.text)}"`
      };
    }

    const coverage = keywordCoverage(bullet.text, requirement.keywords);
    if (raw >= keep && coverage >= this.thresholds.keywordCoverage) {
      return {
        ...matched,
        decision: 'KEEP',
        evidence: [],
        reason: `Strong match (${formatSimilarity(similarity)}) with "${shorten(requirement.text)}"`
      };
    }

    const evidence = mergeEvidence(
      profileIndex.queryVector(vector, EVIDENCE_LIMIT, evidenceThreshold).map(toEvidence),
      profileIndex
        .queryVector(vectorFor(requirementIndex, requirement.text, 'Requirement'), EVIDENCE_LIMIT, evidenceThreshold)
        .map(toEvidence)
    );

    if (evidence.length === 0) {
      return { ...matched, decision: 'KEEP', evidence: [], reason: NO_EVIDENCE_REASON };
    }

    const reason = raw >= keep
      ? `Matches "${shorten(requirement.text)}" (${formatSimilarity(similarity)}) but covers only ${Math.round(coverage * 100)}% of its keywords`
      : `Partial match (${formatSimilarity(similarity)}) with "${shorten(requirement.text)}"`;

    return { ...matched, decision: 'REWRITE', evidence, reason };
  }

  private measureRequirement(
    requirement: JobRequirement,
    requirementIndex: EmbeddingStore<JobRequirement>,
    bulletIndex: EmbeddingStore<ResumeBullet>,
    profileIndex: EmbeddingStore<CapabilityStatement>
  ): RequirementCoverage {
    const vector = vectorFor(requirementIndex, requirement.text, 'Requirement');
    const [nearest] = bulletIndex.queryVector(vector, 1);
    const profileHits = profileIndex.queryVector(vector, EVIDENCE_LIMIT);

    const bulletSimilarity = nearest ? clampUnit(nearest.similarity) : 0;
    const profileSimilarity = profileHits[0] ? clampUnit(profileHits[0].similarity) : 0;

    return {
      requirement,
      bulletSimilarity,
      nearestBullet: nearest?.metadata,
      profileHits,
      best: Math.max(bulletSimilarity, profileSimilarity)
    };
  }

  private proposeAdditions(coverage: RequirementCoverage[]): DecisionRecord[] {
    const { keep, rewrite, evidence: evidenceThreshold } = this.thresholds;
    const ordered = [
      ...coverage.filter(entry => entry.requirement.kind === 'required'),
      ...coverage.filter(entry => entry.requirement.kind === 'preferred')
    ];

    const additions: DecisionRecord[] = [];
    for (const entry of ordered) {
      if (additions.length >= this.options.maxAdditions) break;
      if (entry.bulletSimilarity >= rewrite || !entry.nearestBullet) continue;

      const top = entry.profileHits[0];
      if (!top || clampUnit(top.similarity) < keep) continue;

      const evidence = entry.profileHits
        .filter(hit => clampUnit(hit.similarity) >= evidenceThreshold)
        .map(toEvidence);
      if (evidence.length === 0) continue;

      additions.push({
        decision: 'ADD',
        anchorBulletId: entry.nearestBullet.id,
        section: entry.nearestBullet.section,
        requirementId: entry.requirement.id,
        requirementText: entry.requirement.text,
        similarity: round2(clampUnit(top.similarity)),
        evidence,
        reason: `"${shorten(entry.requirement.skill, 60)}" is not covered by any bullet; profile evidence scores ${formatSimilarity(top.similarity)}`
      });
    }
    return additions;
  }

  private recommend(
    bulletDecisions: DecisionRecord[],
    additions: DecisionRecord[],
    coverage: RequirementCoverage[]
  ): string[] {
    const recommendations: string[] = [];

    for (const record of additions) {
      recommendations.push(
        `Add a bullet for "${record.requirementText ?? ''}" backed by: ${record.evidence[0]?.text ?? 'profile evidence'}`
      );
    }

    for (const record of bulletDecisions) {
      if (record.decision === 'DE_EMPHASIZE') {
        recommendations.push(
          `De-emphasize "${shorten(record.originalText ?? '')}" (similarity ${formatSimilarity(record.similarity)} to the closest requirement)`
        );
      }
    }

    for (const entry of coverage) {
      if (entry.requirement.kind === 'required' && entry.best < this.thresholds.rewrite) {
        recommendations.push(
          `Gap: nothing in the resume or profile addresses the required "${entry.requirement.text}"`
        );
      }
    }

    return recommendations;
  }
}
