/**
 * Knowledge Base Types
 *
 * One explicit record shape per collection. Everything except the identifier
 * (`id`, or `feature` for governance) is optional; consumers substitute a neutral default when absent.
 */

export interface BestPractice {
  id: string;
  title?: string;
  description?: string;
  category?: string;
  difficulty?: string;
  rationale?: string;
  example_good?: string;
  example_bad?: string;
  tags?: string[];
}

export interface Snippet {
  id: string;
  title?: string;
  language?: string;
  use_case?: string;
  code?: string;
  explanation?: string;
  description?: string;
  tags?: string[];
}

export interface TroubleshootingStep {
  step?: number | string;
  action?: string;
  details?: string;
}

export interface TroubleshootingGuide {
  id: string;
  title?: string;
  category?: string;
  symptoms?: string[];
  causes?: string[];
  steps?: TroubleshootingStep[];
  tags?: string[];
}

export interface Tip {
  id: string;
  title?: string;
  tip?: string;
  why_it_matters?: string;
  category?: string;
  tags?: string[];
}

export interface ZoneAvailability {
  available: boolean;
  reason?: string;
  requirements?: string[];
}

export interface GovernanceRule {
  /** Acts as the identifier, e.g. `http-connector` */
  feature: string;
  display_name?: string;
  minimum_zone?: string;
  zones?: Record<string, ZoneAvailability>;
  justification_template?: string;
}

/**
 * Collection names, matching the JSON source file stems
 */
export const COLLECTION = {
  BEST_PRACTICES: 'best_practices',
  SNIPPETS: 'snippets',
  TROUBLESHOOTING: 'troubleshooting',
  TIPS: 'tips',
  GOVERNANCE: 'governance',
} as const;

export type CollectionName = (typeof COLLECTION)[keyof typeof COLLECTION];

export interface CollectionRecordMap {
  best_practices: BestPractice;
  snippets: Snippet;
  troubleshooting: TroubleshootingGuide;
  tips: Tip;
  governance: GovernanceRule;
}

export type KnowledgeCollections = {
  readonly [K in CollectionName]: readonly CollectionRecordMap[K][];
};

/**
 * A single record tagged with the collection it came from
 */
export type KnowledgeEntry =
  | { kind: 'best_practice'; record: BestPractice }
  | { kind: 'snippet'; record: Snippet }
  | { kind: 'troubleshooting'; record: TroubleshootingGuide }
  | { kind: 'tip'; record: Tip }
  | { kind: 'governance'; record: GovernanceRule };

export type KnowledgeKind = KnowledgeEntry['kind'];
