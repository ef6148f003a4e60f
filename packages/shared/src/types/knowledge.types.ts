export type KnowledgeSourceType = 'curated';

interface KnowledgeEntityBase {
  readonly id: string;
  readonly name: string;
  readonly source: KnowledgeSourceType;
}

export interface HistoricalEvent extends KnowledgeEntityBase {
  readonly kind: 'event';
  readonly year: number;
  /** Equals `year` for single-year events. */
  readonly endYear: number;
  readonly location: string;
  readonly casualties: number;
  readonly domain: string;
}

export interface NotablePerson extends KnowledgeEntityBase {
  readonly kind: 'person';
  readonly birthYear: number;
  readonly deathYear: number | null;
  readonly country: string;
  readonly field: string;
}

export interface Organization extends KnowledgeEntityBase {
  readonly kind: 'organization';
  readonly inceptionYear: number;
  readonly country: string;
  readonly orgType: string;
}

export type KnowledgeEntity = HistoricalEvent | NotablePerson | Organization;

export interface KnowledgeBaseStats {
  readonly events: number;
  readonly people: number;
  readonly organizations: number;
}
