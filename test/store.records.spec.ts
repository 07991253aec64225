import fs from 'node:fs';
import path from 'node:path';

import { InvalidInputError, NotFoundError } from '../src/errors';
import { JsonRecordStore } from '../src/store/records';
import { createTempDir, removeDir, sampleFields } from './common';

describe('JsonRecordStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  test('fills defaults and deduplicates skills on create', async () => {
    const store = new JsonRecordStore();

    const candidate = await store.createCandidate({ name: ' Alice ', skills: ['Go', 'Go ', ' SQL'] }, { fileName: 'a.pdf' });

    expect(candidate).toEqual({
      id: expect.any(String),
      name: 'Alice',
      email: null,
      phone: null,
      summary: null,
      skills: ['Go', 'SQL'],
      experience: [],
      education: [],
      projects: [],
      certifications: [],
      interests: [],
      fileName: 'a.pdf',
      createdAt: expect.any(String),
    });
  });

  test('rejects unknown or missing fields', async () => {
    const store = new JsonRecordStore();

    await expect(store.createCandidate({ name: 'Alice', salary: 10 })).rejects.toBeInstanceOf(InvalidInputError);
    await expect(store.createCandidate({ summary: 'No name' })).rejects.toBeInstanceOf(InvalidInputError);
    await expect(store.createCandidate('Alice')).rejects.toBeInstanceOf(InvalidInputError);
  });

  test('stores chunks only for known candidates and only once', async () => {
    const store = new JsonRecordStore();
    const candidate = await store.createCandidate(sampleFields('Alice'));
    const chunk = { id: `${candidate.id}:0`, candidateId: candidate.id, section: 'summary', text: 'Hello', position: 0 };

    await store.saveChunks([chunk]);

    expect(await store.getChunk(chunk.id)).toEqual(chunk);
    expect(await store.getChunkText(chunk.id)).toBe('Hello');
    await expect(store.saveChunks([chunk])).rejects.toBeInstanceOf(InvalidInputError);
    await expect(store.saveChunks([{ ...chunk, id: 'other:0', candidateId: 'other' }])).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });

  test('drops a candidate together with its chunks', async () => {
    const store = new JsonRecordStore();
    const alice = await store.createCandidate(sampleFields('Alice'));
    const bob = await store.createCandidate(sampleFields('Bob'));
    await store.saveChunks([
      { id: 'a:0', candidateId: alice.id, section: 'summary', text: 'A', position: 0 },
      { id: 'b:0', candidateId: bob.id, section: 'summary', text: 'B', position: 0 },
    ]);

    expect(await store.deleteCandidate(alice.id)).toBe(true);
    expect(await store.deleteCandidate(alice.id)).toBe(false);
    expect(await store.listChunkIds()).toEqual(['b:0']);
    expect((await store.listCandidates()).map((candidate) => candidate.name)).toEqual(['Bob']);
  });

  test('reloads what it wrote to disk', async () => {
    const store = new JsonRecordStore({ dataDir: dir });
    const candidate = await store.createCandidate(sampleFields('Alice'));
    await store.saveChunks([{ id: 'a:0', candidateId: candidate.id, section: 'skills', text: 'Skills: Go', position: 0 }]);

    const reopened = new JsonRecordStore({ dataDir: dir });

    expect(await reopened.getCandidate(candidate.id)).toEqual(candidate);
    expect(await reopened.listChunkIds(candidate.id)).toEqual(['a:0']);
    expect(fs.readdirSync(dir)).toEqual(['records.json']);
  });

  test('filters candidates by skills, experience and company', async () => {
    const store = new JsonRecordStore();
    const alice = await store.createCandidate(sampleFields('Alice'));
    const bob = await store.createCandidate(
      sampleFields('Bob', {
        skills: ['Go', 'Postgres'],
        experience: [
          { title: 'Engineer', company: 'Globex Corporation' },
          { title: 'Intern', company: 'Initech' },
        ],
      }),
    );
    const carol = await store.createCandidate(sampleFields('Carol', { skills: ['typescript', 'Kafka'], experience: [] }));

    const ids = async (filter: Parameters<JsonRecordStore['filterCandidates']>[0]) =>
      (await store.filterCandidates(filter)).map((candidate) => candidate.id);

    expect(await ids({})).toEqual([alice.id, bob.id, carol.id]);
    expect(await ids({ skills: ['postgres'] })).toEqual([alice.id, bob.id]);
    expect(await ids({ skills: ['TYPESCRIPT', 'postgres'] })).toEqual([alice.id]);
    expect(await ids({ minExperience: 2 })).toEqual([bob.id]);
    expect(await ids({ minExperience: 1, company: 'ACME' })).toEqual([alice.id]);
    expect(await ids({ company: 'globex' })).toEqual([bob.id]);
    expect(await ids({ skills: ['Rust'] })).toEqual([]);
    expect(await ids({ limit: 1 })).toEqual([alice.id]);
  });

  test('caps filter results at fifty by default', async () => {
    const store = new JsonRecordStore();
    for (let i = 0; i < 52; i += 1) {
      await store.createCandidate({ name: `Candidate ${i}`, skills: ['Go'] });
    }

    expect(await store.filterCandidates({ skills: ['go'] })).toHaveLength(50);
  });

  test('refuses a truncated store file', () => {
    const storePath = path.join(dir, 'records.json');
    fs.writeFileSync(storePath, '{"candidates": [');

    expect(() => new JsonRecordStore({ dataDir: dir })).toThrow(`Record store ${storePath} is malformed: `);
  });

  test('refuses a malformed store file', () => {
    fs.writeFileSync(path.join(dir, 'records.json'), JSON.stringify({ candidates: [{ id: 'x' }], chunks: [] }));

    expect(() => new JsonRecordStore({ dataDir: dir })).toThrow(/^Record store .* is malformed/);
  });
});
