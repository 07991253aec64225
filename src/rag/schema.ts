import { z } from 'zod';

const nullableText = z.string().nullable().default(null);

export const experienceSchema = z
  .object({
    title: nullableText,
    company: nullableText,
    duration: nullableText,
    description: nullableText,
  })
  .strict();

export const educationSchema = z
  .object({
    degree: nullableText,
    institution: nullableText,
    year: nullableText,
    details: nullableText,
  })
  .strict();

export const projectSchema = z
  .object({
    name: nullableText,
    description: nullableText,
    technologies: z.array(z.string()).default([]),
    url: nullableText,
  })
  .strict();

export const certificationSchema = z
  .object({
    name: nullableText,
    issuer: nullableText,
    year: nullableText,
  })
  .strict();

export const cvFieldsSchema = z
  .object({
    name: z.string().trim().min(1),
    email: nullableText,
    phone: nullableText,
    summary: nullableText,
    skills: z
      .array(z.string())
      .default([])
      .transform((skills) => Array.from(new Set(skills.map((skill) => skill.trim()).filter(Boolean)))),
    experience: z.array(experienceSchema).default([]),
    education: z.array(educationSchema).default([]),
    projects: z.array(projectSchema).default([]),
    certifications: z.array(certificationSchema).default([]),
    interests: z.array(z.string()).default([]),
  })
  .strict();

export type Experience = z.infer<typeof experienceSchema>;
export type Education = z.infer<typeof educationSchema>;
export type Project = z.infer<typeof projectSchema>;
export type Certification = z.infer<typeof certificationSchema>;
export type CvFields = z.infer<typeof cvFieldsSchema>;
export type CvFieldsInput = z.input<typeof cvFieldsSchema>;

export interface Candidate extends CvFields {
  id: string;
  fileName: string | null;
  createdAt: string;
}

export interface Chunk {
  id: string;
  candidateId: string;
  section: string;
  text: string;
  position: number;
}

export interface ChunkMetadata {
  candidateId: string;
  section: string;
}

export interface EmbeddingRecord extends ChunkMetadata {
  chunkId: string;
  vector: number[];
  softDeleted: boolean;
  sequence: number;
}

export interface SearchHit extends ChunkMetadata {
  chunkId: string;
  score: number;
}

export interface RetrievedChunk extends SearchHit {
  candidateName: string;
  text: string;
}

export type Confidence = 'high' | 'medium' | 'low';

export interface AnswerSource {
  chunkId: string;
  candidateId: string;
  candidateName: string;
  section: string;
  score: number;
}

export interface AnswerResult {
  answer: string;
  sources: AnswerSource[];
  confidence: Confidence;
}
