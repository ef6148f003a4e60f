import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createChildLogger } from '@chronoqa/shared/src/logger.js';
import { KnowledgeBaseError, toError } from '@chronoqa/shared/src/utils/errors.js';
import type {
  HistoricalEvent,
  KnowledgeBaseStats,
  NotablePerson,
  Organization,
} from '@chronoqa/shared/src/types/knowledge.types.js';

const log = createChildLogger('knowledge:base');

export const DEFAULT_KNOWLEDGE_DATA_PATH = fileURLToPath(
  new URL('./data/curated-knowledge.json', import.meta.url),
);

const RawEventSchema = z
  .object({
    name: z.string().min(1),
    year: z.number().int(),
    end_year: z.number().int().optional(),
    location: z.string().min(1),
    casualties: z.number().int().nonnegative(),
    domain: z.string().min(1),
  })
  .refine((event) => event.end_year === undefined || event.end_year >= event.year, {
    message: 'end_year must not be before year',
    path: ['end_year'],
  });

const RawPersonSchema = z.object({
  name: z.string().min(1),
  birth: z.number().int(),
  death: z.number().int().nullable(),
  country: z.string().min(1),
  field: z.string().min(1),
});

const RawOrganizationSchema = z.object({
  name: z.string().min(1),
  founded: z.number().int(),
  country: z.string().min(1),
  type: z.string().min(1),
});

export const KnowledgeDataSchema = z.object({
  events: z.array(RawEventSchema),
  people: z.array(RawPersonSchema).default([]),
  organizations: z.array(RawOrganizationSchema).default([]),
});

export type KnowledgeDataInput = z.input<typeof KnowledgeDataSchema>;

export interface KnowledgeBase {
  /** Populates the collections once; later calls return the same stats. */
  load(): Promise<KnowledgeBaseStats>;
  readonly isLoaded: boolean;
  readonly events: readonly HistoricalEvent[];
  readonly people: readonly NotablePerson[];
  readonly organizations: readonly Organization[];
  getStats(): KnowledgeBaseStats;
}

export interface KnowledgeBaseOptions {
  readonly dataPath?: string;
  /** Inline data, used instead of reading `dataPath`. */
  readonly data?: KnowledgeDataInput;
}

interface LoadedKnowledge {
  readonly events: readonly HistoricalEvent[];
  readonly people: readonly NotablePerson[];
  readonly organizations: readonly Organization[];
}

function parseKnowledgeData(raw: unknown, origin: string): LoadedKnowledge {
  const result = KnowledgeDataSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new KnowledgeBaseError(`Invalid knowledge data in ${origin}: ${details}`);
  }

  const { events, people, organizations } = result.data;

  return {
    events: events.map(
      (event, i): HistoricalEvent => ({
        kind: 'event',
        id: `EVENT_${String(i)}`,
        name: event.name,
        year: event.year,
        endYear: event.end_year ?? event.year,
        location: event.location,
        casualties: event.casualties,
        domain: event.domain,
        source: 'curated',
      }),
    ),
    people: people.map(
      (person, i): NotablePerson => ({
        kind: 'person',
        id: `PERSON_${String(i)}`,
        name: person.name,
        birthYear: person.birth,
        deathYear: person.death,
        country: person.country,
        field: person.field,
        source: 'curated',
      }),
    ),
    organizations: organizations.map(
      (org, i): Organization => ({
        kind: 'organization',
        id: `ORG_${String(i)}`,
        name: org.name,
        inceptionYear: org.founded,
        country: org.country,
        orgType: org.type,
        source: 'curated',
      }),
    ),
  };
}

async function readKnowledgeFile(dataPath: string): Promise<unknown> {
  try {
    const content = await readFile(dataPath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    throw new KnowledgeBaseError(
      `Failed to read knowledge data from ${dataPath}`,
      toError(error),
    );
  }
}

export function createKnowledgeBase(options: KnowledgeBaseOptions = {}): KnowledgeBase {
  const dataPath = options.dataPath ?? DEFAULT_KNOWLEDGE_DATA_PATH;
  let loaded: LoadedKnowledge | undefined;

  const requireLoaded = (): LoadedKnowledge => {
    if (!loaded) {
      throw new KnowledgeBaseError('Knowledge base accessed before load()');
    }
    return loaded;
  };

  const stats = (knowledge: LoadedKnowledge): KnowledgeBaseStats => ({
    events: knowledge.events.length,
    people: knowledge.people.length,
    organizations: knowledge.organizations.length,
  });

  return {
    async load(): Promise<KnowledgeBaseStats> {
      if (loaded) {
        return stats(loaded);
      }

      const raw = options.data ?? (await readKnowledgeFile(dataPath));
      loaded = parseKnowledgeData(raw, options.data ? 'inline data' : dataPath);

      const loadedStats = stats(loaded);
      log.info(loadedStats, 'Knowledge base loaded');
      return loadedStats;
    },

    get isLoaded(): boolean {
      return loaded !== undefined;
    },

    get events(): readonly HistoricalEvent[] {
      return requireLoaded().events;
    },

    get people(): readonly NotablePerson[] {
      return requireLoaded().people;
    },

    get organizations(): readonly Organization[] {
      return requireLoaded().organizations;
    },

    getStats(): KnowledgeBaseStats {
      return stats(requireLoaded());
    },
  };
}
