import { z } from 'zod';

export const jobDescriptionSchema = z.object({
  title: z.string().trim().min(1),
  company: z.string().trim().min(1),
  description: z.string(),
  requirements: z.array(z.string()).default([]),
  skills: z.array(z.string()).default([]),
  location: z.string().optional(),
  salaryRange: z.string().optional(),
  jobType: z.string().optional(),
  url: z.string().url().optional(),
  postedDate: z.string().optional(),
});

export const userProfileSchema = z.object({
  name: z.string().trim().min(1),
  email: z.string().email(),
  phone: z.string().optional(),
  cvText: z.string(),
  skills: z.array(z.string()).default([]),
  experience: z.array(z.record(z.unknown())).default([]),
  education: z.array(z.record(z.unknown())).default([]),
  linkedinUrl: z.string().url().optional(),
  githubUrl: z.string().url().optional(),
});

export const userPreferencesSchema = z.object({
  jobInterestLevel: z.number().int().min(1).max(10),
  motivation: z.string(),
  relevantExperience: z.string(),
  careerGoals: z.string(),
  companyKnowledge: z.string(),
  concerns: z.string().optional(),
  additionalInfo: z.string().optional(),
});

export const documentTypeSchema = z.enum(['cover_letter', 'motivation_letter']);

export const applicationDocumentSchema = z.object({
  id: z.string(),
  documentType: documentTypeSchema,
  title: z.string(),
  content: z.string(),
  jobId: z.string().optional(),
  createdAt: z.string(),
  metadata: z.record(z.unknown()).default({}),
});

export const interviewPreparationSchema = z.object({
  confidenceChecklist: z.array(z.string()).default([]),
  technicalTopics: z.array(z.string()).default([]),
  behavioralQuestions: z.array(z.string()).default([]),
  technicalQuestions: z.array(z.string()).default([]),
  companyResearch: z.array(z.string()).default([]),
  questionsToAsk: z.array(z.string()).default([]),
  preparationTimeline: z.record(z.array(z.string())).default({}),
});

export const applicationRequestSchema = z.object({
  job: jobDescriptionSchema,
  profile: userProfileSchema,
  preferences: userPreferencesSchema,
});

export const interviewRequestSchema = z.object({
  job: jobDescriptionSchema,
  profile: userProfileSchema,
});

export const jobSourceRequestSchema = z.object({
  source: z.string().trim().min(1, 'Provide a job posting URL or the posting text'),
});

/** Items of a list typed into one field, separated by commas or newlines. */
export function splitList(raw: string): string[] {
  return raw
    .split(/[,\n]/)
    .map((item) => item.trim())
    .filter(Boolean);
}

const listFieldSchema = z
  .union([z.string(), z.array(z.string())])
  .default([])
  .transform((value) => (typeof value === 'string' ? splitList(value) : value.map((item) => item.trim()).filter(Boolean)));

export const manualJobSchema = z.object({
  title: z.string().trim().min(1, 'Enter the job title'),
  company: z.string().trim().min(1, 'Enter the company name'),
  description: z.string().trim().min(1, 'Enter the job description'),
  requirements: listFieldSchema,
  skills: listFieldSchema,
  location: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || undefined),
});

export type JobDescription = z.infer<typeof jobDescriptionSchema>;
export type UserProfile = z.infer<typeof userProfileSchema>;
export type UserPreferences = z.infer<typeof userPreferencesSchema>;
export type DocumentType = z.infer<typeof documentTypeSchema>;
export type ApplicationDocument = z.infer<typeof applicationDocumentSchema>;
export type InterviewPreparation = z.infer<typeof interviewPreparationSchema>;
export type ManualJobInput = z.input<typeof manualJobSchema>;
export type ManualJob = z.output<typeof manualJobSchema>;
