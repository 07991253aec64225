import { Chunk, CvFields } from './schema';

export type ChunkerOptions = {
  maxChars: number;
};

type SectionText = {
  section: string;
  text: string;
};

const clean = (value: string | null | undefined): string => (value ?? '').replace(/\s+/g, ' ').trim();

const joinWith = (separator: string, ...parts: string[]): string => parts.filter(Boolean).join(separator);

// Joins parts as sentences, adding a full stop only where one is missing.
const joinSentences = (...parts: string[]): string =>
  parts
    .filter(Boolean)
    .map((part, index, all) => (index < all.length - 1 && !/[.!?]$/.test(part) ? `${part}.` : part))
    .join(' ');

const withDetail = (head: string, detail: string): string => {
  if (!detail) {
    return head;
  }

  return head ? `${head} (${detail})` : detail;
};

const listOf = (values: string[]): string[] => values.map(clean).filter(Boolean);

const label = (kind: string, name: string, index: number): string => `${kind}:${name || index + 1}`;

const findSentenceBoundary = (text: string, maxChars: number): number => {
  const pattern = /[.!?](?=\s)/g;
  let boundary = -1;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    const end = match.index + 1;
    if (end > maxChars) {
      break;
    }
    boundary = end;
  }

  return boundary;
};

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;

/**
 * Splits text into pieces no longer than `maxChars`, cutting after the last
 * sentence end that fits and falling back to a hard cut when none does.
 */
export const splitText = (text: string, maxChars: number): string[] => {
  if (maxChars < 1) {
    throw new RangeError('maxChars must be at least 1');
  }

  const pieces: string[] = [];
  let rest = text.trim();

  while (rest.length > maxChars) {
    const boundary = findSentenceBoundary(rest, maxChars);
    let end = boundary > 0 ? boundary : maxChars;

    // A hard cut must not split a surrogate pair.
    if (boundary <= 0 && end > 1 && isHighSurrogate(rest.charCodeAt(end - 1))) {
      end -= 1;
    }
    const piece = rest.slice(0, end).trim();

    if (piece) {
      pieces.push(piece);
    }

    rest = rest.slice(end).trim();
  }

  if (rest) {
    pieces.push(rest);
  }

  return pieces;
};

const describeSections = (fields: CvFields): SectionText[] => {
  const sections: SectionText[] = [];

  sections.push({ section: 'summary', text: clean(fields.summary) });

  fields.experience.forEach((entry, index) => {
    const title = clean(entry.title);
    const company = clean(entry.company);
    sections.push({
      section: label('experience', company || title, index),
      text: joinSentences(withDetail(joinWith(' at ', title, company), clean(entry.duration)), clean(entry.description)),
    });
  });

  fields.projects.forEach((entry, index) => {
    const name = clean(entry.name);
    const technologies = listOf(entry.technologies);
    sections.push({
      section: label('project', name, index),
      text: joinSentences(
        name,
        clean(entry.description),
        technologies.length ? `Technologies: ${technologies.join(', ')}` : '',
      ),
    });
  });

  const skills = listOf(fields.skills);
  sections.push({ section: 'skills', text: skills.length ? `Skills: ${skills.join(', ')}` : '' });

  fields.education.forEach((entry, index) => {
    const institution = clean(entry.institution);
    sections.push({
      section: label('education', institution || clean(entry.degree), index),
      text: joinSentences(
        withDetail(joinWith(' from ', clean(entry.degree), institution), clean(entry.year)),
        clean(entry.details),
      ),
    });
  });

  fields.certifications.forEach((entry, index) => {
    const name = clean(entry.name);
    sections.push({
      section: label('certification', name, index),
      text: withDetail(joinWith(' from ', name, clean(entry.issuer)), clean(entry.year)),
    });
  });

  const interests = listOf(fields.interests);
  sections.push({
    section: 'interests',
    text: interests.length ? `Interests and Hobbies: ${interests.join(', ')}` : '',
  });

  return sections;
};

export const chunkCandidate = (candidateId: string, fields: CvFields, { maxChars }: ChunkerOptions): Chunk[] => {
  const chunks: Chunk[] = [];
  const positions = new Map<string, number>();

  for (const { section, text } of describeSections(fields)) {
    if (!text) {
      continue;
    }

    for (const piece of splitText(text, maxChars)) {
      const position = positions.get(section) ?? 0;
      positions.set(section, position + 1);
      chunks.push({
        id: `${candidateId}:${chunks.length}`,
        candidateId,
        section,
        text: piece,
        position,
      });
    }
  }

  return chunks;
};
