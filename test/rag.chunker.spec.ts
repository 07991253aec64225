import { chunkCandidate, splitText } from '../src/rag/chunker';
import { cvFieldsSchema } from '../src/rag/schema';

describe('splitText', () => {
  test('keeps short text whole', () => {
    expect(splitText('  Short text.  ', 100)).toEqual(['Short text.']);
  });

  test('cuts after the last sentence that fits', () => {
    expect(splitText('One two. Three four. Five.', 12)).toEqual(['One two.', 'Three four.', 'Five.']);
  });

  test('hard-cuts text without sentence breaks', () => {
    expect(splitText('abcdefghijklmnopqrstuvwxyz', 10)).toEqual(['abcdefghij', 'klmnopqrst', 'uvwxyz']);
  });

  test('does not split a surrogate pair on a hard cut', () => {
    expect(splitText('ab😀cd', 3)).toEqual(['ab', '😀c', 'd']);
  });

  test('returns nothing for blank text', () => {
    expect(splitText('   ', 10)).toEqual([]);
  });

  test('rejects a non-positive limit', () => {
    expect(() => splitText('text', 0)).toThrow(RangeError);
  });
});

describe('chunkCandidate', () => {
  const fields = cvFieldsSchema.parse({
    name: 'Alice',
    summary: '  Backend   engineer\nfocused on payments. ',
    skills: ['Go', ' Kafka ', 'Go', ''],
    experience: [
      { title: 'Senior Engineer', company: 'Acme', duration: '2020-2023', description: 'Led the billing team.' },
      { title: 'Intern', description: 'Wrote tests.' },
      {},
    ],
    projects: [{ name: 'Ledger', description: 'Double-entry service.', technologies: ['Go', 'Postgres'] }],
    education: [{ degree: 'BSc Computer Science', institution: 'State University', year: '2019' }],
    certifications: [{ name: 'CKA', issuer: 'CNCF' }],
    interests: ['chess'],
  });

  test('emits one chunk per non-empty section in a fixed order', () => {
    const chunks = chunkCandidate('c1', fields, { maxChars: 500 });

    expect(chunks.map(({ id, section, text, position }) => ({ id, section, text, position }))).toEqual([
      { id: 'c1:0', section: 'summary', text: 'Backend engineer focused on payments.', position: 0 },
      {
        id: 'c1:1',
        section: 'experience:Acme',
        text: 'Senior Engineer at Acme (2020-2023). Led the billing team.',
        position: 0,
      },
      { id: 'c1:2', section: 'experience:Intern', text: 'Intern. Wrote tests.', position: 0 },
      {
        id: 'c1:3',
        section: 'project:Ledger',
        text: 'Ledger. Double-entry service. Technologies: Go, Postgres',
        position: 0,
      },
      { id: 'c1:4', section: 'skills', text: 'Skills: Go, Kafka', position: 0 },
      {
        id: 'c1:5',
        section: 'education:State University',
        text: 'BSc Computer Science from State University (2019)',
        position: 0,
      },
      { id: 'c1:6', section: 'certification:CKA', text: 'CKA from CNCF', position: 0 },
      { id: 'c1:7', section: 'interests', text: 'Interests and Hobbies: chess', position: 0 },
    ]);
    expect(chunks.every((chunk) => chunk.candidateId === 'c1')).toBe(true);
  });

  test('numbers the pieces of a long section by position', () => {
    const chunks = chunkCandidate('c2', cvFieldsSchema.parse({ name: 'Bob', summary: 'First part. Second part.' }), {
      maxChars: 15,
    });

    expect(chunks.map(({ id, section, text, position }) => ({ id, section, text, position }))).toEqual([
      { id: 'c2:0', section: 'summary', text: 'First part.', position: 0 },
      { id: 'c2:1', section: 'summary', text: 'Second part.', position: 1 },
    ]);
  });

  test('emits nothing for a CV with only a name', () => {
    expect(chunkCandidate('c3', cvFieldsSchema.parse({ name: 'Carol' }), { maxChars: 100 })).toEqual([]);
  });
});
