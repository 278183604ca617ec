import { v4 as uuidv4 } from 'uuid';
import { errorMessage, unwrap } from './errors';
import { createLogger } from './logger';
import type { HandleSource } from './modelResolver';
import { dedent, fillTemplate, type TemplateValues } from './promptTemplate';
import type { ApplicationDocument, DocumentType, JobDescription, UserPreferences, UserProfile } from './schemas';

const log = createLogger('JobApplicationAgent');

const ANALYSIS_PROMPT = dedent(`
  Analyze this job description and extract key information:

  Job Title: {title}
  Company: {company}
  Description: {description}

  Please extract:
  1. Key requirements and qualifications
  2. Technical skills needed
  3. Soft skills emphasized
  4. Company culture indicators
  5. Growth opportunities mentioned

  Format your response as a structured analysis.
`);

const COVER_LETTER_PROMPT = dedent(`
  Write a compelling cover letter for this job application:

  Job: {jobTitle} at {company}
  Job Description: {jobDescription}

  Applicant Profile:
  Name: {name}
  Skills: {skills}
  Experience: {experience}

  User Preferences:
  Motivation: {motivation}
  Relevant Experience: {relevantExperience}
  Career Goals: {careerGoals}
  Company Knowledge: {companyKnowledge}
  Additional Information: {additionalInfo}

  Write a professional, personalized cover letter that shows genuine interest in the role,
  highlights relevant experience and skills, and connects the applicant's goals with the opportunity.
  Keep it to 3-4 paragraphs and maintain a professional tone.
  Do not include placeholders like [Your Name]; sign with the applicant's name.
`);

const MOTIVATION_LETTER_PROMPT = dedent(`
  Write a detailed motivation letter for this job application:

  Job: {jobTitle} at {company}

  Focus on:
  1. Deep personal motivation for this specific role
  2. Alignment with career aspirations
  3. Unique value proposition
  4. Specific examples of relevant achievements
  5. Future contributions to the company

  User's Motivation: {motivation}
  Career Goals: {careerGoals}
  Relevant Experience: {relevantExperience}

  Write a compelling motivation letter that goes beyond the cover letter.
`);

export interface ApplicationOutcome {
  analysis?: string;
  documents: ApplicationDocument[];
  error?: string;
}

export class JobApplicationAgent {
  constructor(private readonly models: HandleSource) {}

  private async complete(template: string, values: TemplateValues): Promise<string> {
    const model = unwrap(this.models.getHandle());
    const text = await model.invoke(fillTemplate(template, values));
    return text.trim();
  }

  async analyzeJob(job: JobDescription): Promise<string> {
    return this.complete(ANALYSIS_PROMPT, {
      title: job.title,
      company: job.company,
      description: job.description,
    });
  }

  async generateCoverLetter(
    job: JobDescription,
    profile: UserProfile,
    preferences: UserPreferences,
  ): Promise<ApplicationDocument> {
    const content = await this.complete(COVER_LETTER_PROMPT, {
      jobTitle: job.title,
      company: job.company,
      jobDescription: job.description,
      name: profile.name,
      skills: profile.skills.join(', '),
      experience: profile.experience.length > 0 ? JSON.stringify(profile.experience) : profile.cvText.slice(0, 2000),
      motivation: preferences.motivation,
      relevantExperience: preferences.relevantExperience,
      careerGoals: preferences.careerGoals,
      companyKnowledge: preferences.companyKnowledge,
      additionalInfo: preferences.additionalInfo ?? 'None',
    });
    return buildDocument('cover_letter', `Cover Letter - ${job.title} at ${job.company}`, content);
  }

  async generateMotivationLetter(
    job: JobDescription,
    _profile: UserProfile,
    preferences: UserPreferences,
  ): Promise<ApplicationDocument> {
    const content = await this.complete(MOTIVATION_LETTER_PROMPT, {
      jobTitle: job.title,
      company: job.company,
      motivation: preferences.motivation,
      careerGoals: preferences.careerGoals,
      relevantExperience: preferences.relevantExperience,
    });
    return buildDocument('motivation_letter', `Motivation Letter - ${job.title} at ${job.company}`, content);
  }

  /** Analysis plus both letters. Failures come back in `error` instead of being thrown. */
  async processApplication(
    job: JobDescription,
    profile: UserProfile,
    preferences: UserPreferences,
  ): Promise<ApplicationOutcome> {
    try {
      const analysis = await this.analyzeJob(job);
      const coverLetter = await this.generateCoverLetter(job, profile, preferences);
      const motivationLetter = await this.generateMotivationLetter(job, profile, preferences);
      return { analysis, documents: [coverLetter, motivationLetter] };
    } catch (error) {
      log.error({ err: errorMessage(error), job: job.title }, 'Application processing failed');
      return { error: `Error processing application: ${errorMessage(error)}`, documents: [] };
    }
  }
}

function buildDocument(documentType: DocumentType, title: string, content: string): ApplicationDocument {
  return {
    id: uuidv4(),
    documentType,
    title,
    content,
    createdAt: new Date().toISOString(),
    metadata: {},
  };
}
