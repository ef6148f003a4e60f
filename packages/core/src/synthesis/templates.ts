import type {
  HistoricalEvent,
  NotablePerson,
  Organization,
} from '@chronoqa/shared/src/types/knowledge.types.js';

/**
 * A question pattern with `{placeholder}` markers and the function that derives
 * the answer from the entities the placeholders refer to.
 */
export interface QuestionTemplate<TArgs extends readonly unknown[]> {
  readonly question: string;
  readonly answer: (...args: TArgs) => string;
}

export type TemplateValues = Readonly<Record<string, string | number>>;

/** Unknown placeholders are left in place so the content gate rejects the result. */
export function fillTemplate(pattern: string, values: TemplateValues): string {
  return pattern.replace(/\{(\w+)\}/g, (marker, key: string) => {
    const value = values[key];
    return value === undefined ? marker : String(value);
  });
}

export function yesNo(condition: boolean): string {
  return condition ? 'yes' : 'no';
}

export function formatYears(years: number): string {
  return years === 1 ? '1 year' : `${String(years)} years`;
}

export function decadeOf(year: number): number {
  return Math.floor(year / 10) * 10;
}

export function formatDecade(year: number): string {
  return `${String(decadeOf(year))}s`;
}

export function centuryOf(year: number): number {
  return Math.floor((year - 1) / 100) + 1;
}

export function formatOrdinal(n: number): string {
  const lastTwo = n % 100;
  if (lastTwo >= 11 && lastTwo <= 13) {
    return `${String(n)}th`;
  }
  switch (n % 10) {
    case 1:
      return `${String(n)}st`;
    case 2:
      return `${String(n)}nd`;
    case 3:
      return `${String(n)}rd`;
    default:
      return `${String(n)}th`;
  }
}

export function formatCentury(year: number): string {
  return `${formatOrdinal(centuryOf(year))} century`;
}

// Comparisons are strict: equal years resolve to the second operand.

export const EVENT_ATTRIBUTE_TEMPLATES: readonly QuestionTemplate<[HistoricalEvent]>[] = [
  { question: 'When did {event} occur?', answer: (e) => String(e.year) },
  { question: 'Where did {event} take place?', answer: (e) => e.location },
  { question: 'In which year did {event} happen?', answer: (e) => String(e.year) },
  { question: 'What was the location of {event}?', answer: (e) => e.location },
];

export const EVENT_COMPARISON_TEMPLATES: readonly QuestionTemplate<
  [HistoricalEvent, HistoricalEvent]
>[] = [
  {
    question: 'Which occurred first, {event1} or {event2}?',
    answer: (e1, e2) => (e1.year < e2.year ? e1.name : e2.name),
  },
  {
    question: 'Which happened later, {event1} or {event2}?',
    answer: (e1, e2) => (e1.year > e2.year ? e1.name : e2.name),
  },
  {
    question: 'Did {event1} happen before {event2}?',
    answer: (e1, e2) => yesNo(e1.year < e2.year),
  },
];

export const PERSON_ATTRIBUTE_TEMPLATES: readonly QuestionTemplate<[NotablePerson]>[] = [
  { question: 'When was {person} born?', answer: (p) => String(p.birthYear) },
  { question: 'What nationality is {person}?', answer: (p) => p.country },
  { question: 'What field does {person} work in?', answer: (p) => p.field },
];

export const ORGANIZATION_ATTRIBUTE_TEMPLATES: readonly QuestionTemplate<[Organization]>[] = [
  { question: 'In which year was {organization} founded?', answer: (o) => String(o.inceptionYear) },
  { question: 'In which country is {organization} based?', answer: (o) => o.country },
  { question: 'What type of organization is {organization}?', answer: (o) => o.orgType },
];

export const YEAR_START_TEMPLATES: readonly QuestionTemplate<[HistoricalEvent]>[] = [
  { question: 'Which {domain} event began in {year}?', answer: (e) => e.name },
];

/** Only valid when no other event of the domain was under way that year. */
export const YEAR_ACTIVE_TEMPLATES: readonly QuestionTemplate<[HistoricalEvent]>[] = [
  { question: 'What {domain} event took place in the year {year}?', answer: (e) => e.name },
];

export const PERSON_COMPARISON_TEMPLATES: readonly QuestionTemplate<
  [NotablePerson, NotablePerson]
>[] = [
  {
    question: 'Who was born first, {person1} or {person2}?',
    answer: (p1, p2) => (p1.birthYear < p2.birthYear ? p1.name : p2.name),
  },
  {
    question: 'Who was born later, {person1} or {person2}?',
    answer: (p1, p2) => (p1.birthYear > p2.birthYear ? p1.name : p2.name),
  },
  {
    question: 'Was {person1} born before {person2}?',
    answer: (p1, p2) => yesNo(p1.birthYear < p2.birthYear),
  },
];

export const ORGANIZATION_COMPARISON_TEMPLATES: readonly QuestionTemplate<
  [Organization, Organization]
>[] = [
  {
    question: 'Which was founded earlier, {organization1} or {organization2}?',
    answer: (o1, o2) => (o1.inceptionYear < o2.inceptionYear ? o1.name : o2.name),
  },
  {
    question: 'Which was founded more recently, {organization1} or {organization2}?',
    answer: (o1, o2) => (o1.inceptionYear > o2.inceptionYear ? o1.name : o2.name),
  },
  {
    question: 'Was {organization1} founded before {organization2}?',
    answer: (o1, o2) => yesNo(o1.inceptionYear < o2.inceptionYear),
  },
];

export const YEAR_GAP_TEMPLATES: readonly QuestionTemplate<[HistoricalEvent, HistoricalEvent]>[] = [
  {
    question: 'How many years separate the start of {event1} and the start of {event2}?',
    answer: (e1, e2) => String(Math.abs(e1.year - e2.year)),
  },
  {
    question: 'How many years passed between the beginning of {event1} and the beginning of {event2}?',
    answer: (e1, e2) => String(Math.abs(e1.year - e2.year)),
  },
];

export const EVENT_COUNTING_PATTERNS: readonly string[] = [
  'How many {domain} events occurred between {start_year} and {end_year}?',
  'What is the count of {domain} events from {start_year} to {end_year}?',
  'How many events in the {domain} domain happened during {start_year}-{end_year}?',
];

export const PERSON_COUNTING_PATTERNS: readonly string[] = [
  'How many notable figures in {field} were born between {start_year} and {end_year}?',
  'What is the number of {field} figures born from {start_year} to {end_year}?',
];

export const ORGANIZATION_COUNTING_PATTERNS: readonly string[] = [
  'How many organizations classed as {org_type} were founded between {start_year} and {end_year}?',
  'What is the count of {org_type} organizations founded from {start_year} to {end_year}?',
];

export const EVENT_INFLUENCE_TEMPLATES: readonly QuestionTemplate<
  [HistoricalEvent, HistoricalEvent]
>[] = [
  {
    question: 'Is it chronologically possible that {event1} influenced {event2}?',
    answer: (e1, e2) => yesNo(e1.year < e2.year),
  },
  {
    question: 'Given when each began, could {event1} have contributed to {event2}?',
    answer: (e1, e2) => yesNo(e1.year < e2.year),
  },
];

export const ORGANIZATION_INFLUENCE_TEMPLATES: readonly QuestionTemplate<
  [Organization, HistoricalEvent]
>[] = [
  {
    question: 'Did {organization} exist in time to play a role in {event}?',
    answer: (o, e) => yesNo(o.inceptionYear <= e.year),
  },
  {
    question: 'Had {organization} been founded by the time {event} began?',
    answer: (o, e) => yesNo(o.inceptionYear <= e.year),
  },
];

export const EVENT_DURATION_TEMPLATES: readonly QuestionTemplate<[HistoricalEvent]>[] = [
  { question: 'How long did {event} last?', answer: (e) => formatYears(e.endYear - e.year) },
  { question: 'What was the duration of {event}?', answer: (e) => formatYears(e.endYear - e.year) },
  {
    question: 'For how many years did {event} continue?',
    answer: (e) => formatYears(e.endYear - e.year),
  },
];

export const LIFESPAN_TEMPLATES: readonly QuestionTemplate<[NotablePerson]>[] = [
  {
    question: 'Roughly how many years did {person} live?',
    answer: (p) => (p.deathYear === null ? '' : formatYears(p.deathYear - p.birthYear)),
  },
  {
    question: 'About how long was the life of {person}?',
    answer: (p) => (p.deathYear === null ? '' : formatYears(p.deathYear - p.birthYear)),
  },
];

export const SEQUENCE_PATTERNS: readonly string[] = [
  'What is the chronological order of these events: {events}?',
  'Arrange these events in chronological order: {events}',
  'Order these events from earliest to latest: {events}',
];

export const PERSON_EVENT_TEMPLATES: readonly QuestionTemplate<[NotablePerson, HistoricalEvent]>[] =
  [
    {
      question: 'Was {person} born before {event} began?',
      answer: (p, e) => yesNo(p.birthYear < e.year),
    },
  ];

export const ORGANIZATION_EVENT_TEMPLATES: readonly QuestionTemplate<
  [Organization, HistoricalEvent]
>[] = [
  {
    question: 'Was {organization} founded before {event} began?',
    answer: (o, e) => yesNo(o.inceptionYear < e.year),
  },
];

export const CLUSTERING_PATTERNS: readonly string[] = [
  'In which decade did the most {domain} events occur?',
  'Which decade saw the largest number of {domain} events?',
];

/** Only valid for events that start and end in the same decade. */
export const DECADE_SPAN_TEMPLATES: readonly QuestionTemplate<[HistoricalEvent]>[] = [
  { question: 'In which decade did {event} take place?', answer: (e) => formatDecade(e.year) },
];

export const DECADE_START_TEMPLATES: readonly QuestionTemplate<[HistoricalEvent]>[] = [
  { question: 'During which decade did {event} begin?', answer: (e) => formatDecade(e.year) },
];

/** Only valid for events that start and end in the same century. */
export const CENTURY_SPAN_TEMPLATES: readonly QuestionTemplate<[HistoricalEvent]>[] = [
  { question: 'In which century did {event} take place?', answer: (e) => formatCentury(e.year) },
];

export const CENTURY_START_TEMPLATES: readonly QuestionTemplate<[HistoricalEvent]>[] = [
  { question: 'During which century did {event} begin?', answer: (e) => formatCentury(e.year) },
];

export const COUNTERFACTUAL_SHIFT_PATTERNS: readonly string[] = [
  'If {event} had happened {offset} years {direction}, in which year would it have begun?',
  'Suppose {event} had started {offset} years {direction}. What year would that have been?',
];

export const COUNTERFACTUAL_PRECEDENCE_PATTERNS: readonly string[] = [
  'If {event1} had happened {offset} years {direction}, would it have begun before {event2}?',
];

export const PERSON_ALIVE_TEMPLATES: readonly QuestionTemplate<[NotablePerson, HistoricalEvent]>[] =
  [
    {
      question: 'Was {person} alive during {event}?',
      answer: (p, e) =>
        yesNo(p.birthYear <= e.endYear && (p.deathYear === null || p.deathYear >= e.year)),
    },
    {
      question: 'Could {person} have lived through {event}?',
      answer: (p, e) =>
        yesNo(p.birthYear <= e.endYear && (p.deathYear === null || p.deathYear >= e.year)),
    },
  ];

export const EVENT_OVERLAP_TEMPLATES: readonly QuestionTemplate<
  [HistoricalEvent, HistoricalEvent]
>[] = [
  {
    question: 'Did {event1} and {event2} overlap in time?',
    answer: (a, b) => yesNo(a.year <= b.endYear && b.year <= a.endYear),
  },
  {
    question: 'Were {event1} and {event2} ever under way at the same time?',
    answer: (a, b) => yesNo(a.year <= b.endYear && b.year <= a.endYear),
  },
];
