import { errorMessage, unwrap } from './errors';
import { createLogger } from './logger';
import type { HandleSource } from './modelResolver';
import { dedent, fillTemplate, parseList, type TemplateValues } from './promptTemplate';
import type { InterviewPreparation, JobDescription, UserProfile } from './schemas';

const log = createLogger('InterviewPrepAgent');

const MAX_QUESTIONS_TO_ASK = 8;

export const DEFAULT_QUESTIONS_TO_ASK = [
  'What are the biggest challenges facing the team right now?',
  'How do you measure success in this role?',
  'What opportunities are there for professional development?',
  'Can you describe the team culture and collaboration style?',
  "What are the company's priorities for the next year?",
];

export const PREPARATION_TIMELINE: Record<string, string[]> = {
  'Week 1': ['Foundation study', 'Core concepts review'],
  'Week 2': ['Technical practice', 'Mock coding sessions'],
  'Week 3': ['Behavioral prep', 'STAR method practice'],
  'Final Days': ['Review and polish', 'Interview simulation'],
};

const CHECKLIST_PROMPT = dedent(`
  Create a comprehensive confidence checklist for this interview:

  Job: {jobTitle} at {company}
  Key Requirements: {requirements}
  User Skills: {userSkills}

  Create a checklist of topics the candidate should be very confident discussing:
  technical concepts and skills, relevant project experiences, industry knowledge,
  company knowledge and role-specific competencies.

  Each item should be something concrete they can prepare for.
  Return only the list items, one per line, without bullet points.
`);

const TECHNICAL_PROMPT = dedent(`
  Generate technical interview questions for this role:

  Job: {jobTitle} at {company}
  Technical Requirements: {requirements}
  Required Skills: {skills}

  Create 10-15 technical questions covering core technical skills, problem-solving
  scenarios, system design (if applicable) and real-world application scenarios.

  Return only the questions, one per line.
`);

const BEHAVIORAL_PROMPT = dedent(`
  Generate behavioral interview questions for this role:

  Job: {jobTitle} at {company}
  Job Description: {description}

  Create 8-12 behavioral questions suited to the STAR method. Focus on the competencies
  most relevant to this specific role.

  Format: "Tell me about a time when..." or "Describe a situation where..."
  Return only the questions, one per line.
`);

const QUESTIONS_TO_ASK_PROMPT = dedent(`
  Generate thoughtful questions to ask the interviewer for this role:

  Job: {jobTitle} at {company}

  Create 5-8 questions that show genuine interest in the role, understanding of the
  business and a desire to contribute and grow.
  Avoid questions about salary, benefits, or basic company information easily found online.

  Return only the questions, one per line.
`);

const isQuestion = (line: string) => line.includes('?');

export interface InterviewOutcome {
  interviewPrep?: InterviewPreparation;
  error?: string;
}

export class InterviewPrepAgent {
  constructor(private readonly models: HandleSource) {}

  private async complete(template: string, values: TemplateValues): Promise<string> {
    const model = unwrap(this.models.getHandle());
    return model.invoke(fillTemplate(template, values));
  }

  async createConfidenceChecklist(job: JobDescription, profile: UserProfile): Promise<string[]> {
    const text = await this.complete(CHECKLIST_PROMPT, {
      jobTitle: job.title,
      company: job.company,
      requirements: job.requirements.join(', '),
      userSkills: profile.skills.join(', '),
    });
    return parseList(text);
  }

  async generateTechnicalQuestions(job: JobDescription): Promise<string[]> {
    const text = await this.complete(TECHNICAL_PROMPT, {
      jobTitle: job.title,
      company: job.company,
      requirements: job.requirements.join(', '),
      skills: job.skills.join(', '),
    });
    return parseList(text, isQuestion);
  }

  async generateBehavioralQuestions(job: JobDescription): Promise<string[]> {
    const text = await this.complete(BEHAVIORAL_PROMPT, {
      jobTitle: job.title,
      company: job.company,
      description: job.description,
    });
    return parseList(text, (line) => line.includes('Tell me') || line.includes('Describe') || isQuestion(line));
  }

  async generateQuestionsToAsk(job: JobDescription): Promise<string[]> {
    const text = await this.complete(QUESTIONS_TO_ASK_PROMPT, {
      jobTitle: job.title,
      company: job.company,
    });
    const questions = parseList(text, isQuestion);
    if (questions.length < 3) questions.push(...DEFAULT_QUESTIONS_TO_ASK);
    return questions.slice(0, MAX_QUESTIONS_TO_ASK);
  }

  /** Runs every generator in turn. Failures come back in `error` instead of being thrown. */
  async prepareForInterview(job: JobDescription, profile: UserProfile): Promise<InterviewOutcome> {
    try {
      const confidenceChecklist = await this.createConfidenceChecklist(job, profile);
      const technicalQuestions = await this.generateTechnicalQuestions(job);
      const behavioralQuestions = await this.generateBehavioralQuestions(job);
      const questionsToAsk = await this.generateQuestionsToAsk(job);

      return {
        interviewPrep: {
          confidenceChecklist,
          technicalTopics: job.skills,
          technicalQuestions,
          behavioralQuestions,
          companyResearch: [],
          questionsToAsk,
          preparationTimeline: PREPARATION_TIMELINE,
        },
      };
    } catch (error) {
      log.error({ err: errorMessage(error), job: job.title }, 'Interview preparation failed');
      return { error: `Error preparing for interview: ${errorMessage(error)}` };
    }
  }
}
