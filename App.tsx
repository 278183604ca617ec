import React, { useCallback, useEffect, useRef, useState } from 'react';
import {
  AlertCircle,
  Briefcase,
  CheckCircle,
  ClipboardCopy,
  FileText,
  Loader2,
  MessageSquare,
  RefreshCw,
  Upload,
  User,
} from 'lucide-react';
import type {
  ApiError,
  ApplicationResult,
  InterviewPreparation,
  JobDescription,
  ManualJobInput,
  StatusResponse,
  UserPreferences,
  UserProfile,
} from './types';

// Relative so the vite dev server can proxy it to the Node server on port 3000
const API_BASE_URL = '/api';

type Tab = 'profile' | 'application' | 'interview';
type JobMode = 'posting' | 'manual';
type ManualJobForm = Record<keyof ManualJobInput, string>;

async function request<T>(path: string, init?: RequestInit): Promise<T> {
  const response = await fetch(`${API_BASE_URL}${path}`, init);
  if (!response.ok) {
    const errorData: ApiError = await response.json();
    throw new Error(errorData.details ? `${errorData.error}: ${errorData.details}` : errorData.error);
  }
  return response.json();
}

function postJson<T>(path: string, body: unknown): Promise<T> {
  return request<T>(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

const messageOf = (err: unknown) => (err instanceof Error ? err.message : 'An unexpected error occurred.');

const inputClass =
  'w-full rounded-lg border-gray-300 border p-2.5 text-sm focus:ring-2 focus:ring-blue-500 focus:border-blue-500 outline-none bg-white text-gray-900';

const Field: React.FC<{ label: string; htmlFor: string; children: React.ReactNode }> = ({ label, htmlFor, children }) => (
  <div>
    <label htmlFor={htmlFor} className="block text-sm font-medium text-gray-700 mb-1">{label}</label>
    {children}
  </div>
);

const ErrorBanner: React.FC<{ message: string }> = ({ message }) =>
  message ? (
    <div role="alert" className="p-3 bg-red-50 text-red-700 rounded-lg flex items-center gap-2 text-sm">
      <AlertCircle className="w-4 h-4" />
      {message}
    </div>
  ) : null;

const SubmitButton: React.FC<{ busy: boolean; label: string; disabled?: boolean }> = ({ busy, label, disabled }) => (
  <button
    type="submit"
    disabled={busy || disabled}
    className={`
      px-6 py-2.5 rounded-lg font-semibold text-white shadow-md transition-all
      ${busy || disabled ? 'bg-gray-400 cursor-not-allowed' : 'bg-blue-600 hover:bg-blue-700 hover:shadow-lg'}
    `}
  >
    {busy ? (
      <span className="flex items-center gap-2">
        <Loader2 className="w-5 h-5 animate-spin" />
        Working...
      </span>
    ) : label}
  </button>
);

const ListCard: React.FC<{ title: string; items: string[] }> = ({ title, items }) => (
  <div className="bg-white rounded-xl shadow-sm border border-gray-100 p-6">
    <h4 className="text-sm font-medium text-gray-500 uppercase tracking-wider mb-3">{title}</h4>
    {items.length === 0 ? (
      <p className="text-sm text-gray-400">Nothing generated.</p>
    ) : (
      <ul className="list-disc list-inside space-y-1 text-gray-700">
        {items.map((item, i) => <li key={i}>{item}</li>)}
      </ul>
    )}
  </div>
);

const emptyPreferences: UserPreferences = {
  jobInterestLevel: 7,
  motivation: '',
  relevantExperience: '',
  careerGoals: '',
  companyKnowledge: '',
};

const emptyManualJob: ManualJobForm = {
  title: '',
  company: '',
  description: '',
  requirements: '',
  skills: '',
  location: '',
};

const App: React.FC = () => {
  const [tab, setTab] = useState<Tab>('profile');
  const [status, setStatus] = useState<StatusResponse | null>(null);
  const [checkingHealth, setCheckingHealth] = useState(false);

  // Profile
  const [name, setName] = useState('');
  const [email, setEmail] = useState('');
  const [phone, setPhone] = useState('');
  const [skills, setSkills] = useState('');
  const [experienceSummary, setExperienceSummary] = useState('');
  const [cvFile, setCvFile] = useState<File | null>(null);
  const [profile, setProfile] = useState<UserProfile | null>(null);
  const fileInputRef = useRef<HTMLInputElement>(null);

  // Job and application
  const [jobMode, setJobMode] = useState<JobMode>('posting');
  const [jobSource, setJobSource] = useState('');
  const [manualJob, setManualJob] = useState<ManualJobForm>(emptyManualJob);
  const [job, setJob] = useState<JobDescription | null>(null);
  const [preferences, setPreferences] = useState<UserPreferences>(emptyPreferences);
  const [application, setApplication] = useState<ApplicationResult | null>(null);
  const [interview, setInterview] = useState<InterviewPreparation | null>(null);

  const [busy, setBusy] = useState(false);
  const [errorMessage, setErrorMessage] = useState('');

  const loadStatus = useCallback(async () => {
    try {
      setStatus(await request<StatusResponse>('/status'));
    } catch (err) {
      setErrorMessage(`Could not reach the server: ${messageOf(err)}`);
    }
  }, []);

  useEffect(() => {
    void loadStatus();
  }, [loadStatus]);

  const runHealthCheck = async () => {
    setCheckingHealth(true);
    try {
      await postJson('/health', {});
      await loadStatus();
    } catch (err) {
      setErrorMessage(messageOf(err));
    } finally {
      setCheckingHealth(false);
    }
  };

  const run = async (action: () => Promise<void>) => {
    setBusy(true);
    setErrorMessage('');
    try {
      await action();
    } catch (err) {
      setErrorMessage(messageOf(err));
    } finally {
      setBusy(false);
    }
  };

  const handleProfileSubmit = (e: React.FormEvent) => {
    e.preventDefault();
    void run(async () => {
      const formData = new FormData();
      formData.append('name', name);
      formData.append('email', email);
      formData.append('phone', phone);
      formData.append('skills', skills);
      formData.append('cvText', experienceSummary);
      if (cvFile) formData.append('cvFile', cvFile);
      setProfile(await request<UserProfile>('/profile', { method: 'POST', body: formData }));
    });
  };

  const handleSaveJob = () => {
    void run(async () => {
      const saved = jobMode === 'posting'
        ? await postJson<JobDescription>('/job', { source: jobSource })
        : await postJson<JobDescription>('/job/manual', manualJob);
      setJob(saved);
      setApplication(null);
      setInterview(null);
    });
  };

  const updateManualJob = (key: keyof ManualJobForm, value: string) =>
    setManualJob((current) => ({ ...current, [key]: value }));

  const handleApplicationSubmit = (e: React.FormEvent) => {
    e.preventDefault();
    if (!job || !profile) return;
    void run(async () => {
      setApplication(await postJson<ApplicationResult>('/application', { job, profile, preferences }));
    });
  };

  const handleInterviewSubmit = (e: React.FormEvent) => {
    e.preventDefault();
    if (!job || !profile) return;
    void run(async () => {
      setInterview(await postJson<InterviewPreparation>('/interview', { job, profile }));
    });
  };

  const updatePreference = <K extends keyof UserPreferences>(key: K, value: UserPreferences[K]) =>
    setPreferences((current) => ({ ...current, [key]: value }));

  const models = status?.models;
  const activeModel = models?.activeModel;
  const manualJobComplete = Boolean(manualJob.title.trim() && manualJob.company.trim() && manualJob.description.trim());

  const jobPanel = (
    <div className="space-y-3">
      <div className="flex gap-4 text-sm">
        {([
          ['posting', 'From a posting'],
          ['manual', 'Enter manually'],
        ] as const).map(([mode, label]) => (
          <label key={mode} className="flex items-center gap-1 text-gray-700">
            <input type="radio" name="jobMode" checked={jobMode === mode} onChange={() => setJobMode(mode)} />
            {label}
          </label>
        ))}
      </div>
      {jobMode === 'posting' ? (
        <Field label="Job posting URL or text" htmlFor="jobSource">
          <textarea
            id="jobSource"
            value={jobSource}
            onChange={(e) => setJobSource(e.target.value)}
            rows={4}
            placeholder="https://... or paste the posting"
            className={inputClass}
          />
        </Field>
      ) : (
        <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
          <div className="space-y-3">
            <Field label="Job title" htmlFor="jobTitle">
              <input id="jobTitle" value={manualJob.title} onChange={(e) => updateManualJob('title', e.target.value)} className={inputClass} />
            </Field>
            <Field label="Company name" htmlFor="jobCompany">
              <input id="jobCompany" value={manualJob.company} onChange={(e) => updateManualJob('company', e.target.value)} className={inputClass} />
            </Field>
            <Field label="Location" htmlFor="jobLocation">
              <input id="jobLocation" value={manualJob.location} onChange={(e) => updateManualJob('location', e.target.value)} className={inputClass} />
            </Field>
          </div>
          <div className="space-y-3">
            <Field label="Key requirements (one per line)" htmlFor="jobRequirements">
              <textarea id="jobRequirements" rows={3} value={manualJob.requirements} onChange={(e) => updateManualJob('requirements', e.target.value)} className={inputClass} />
            </Field>
            <Field label="Required skills (one per line)" htmlFor="jobSkills">
              <textarea id="jobSkills" rows={3} value={manualJob.skills} onChange={(e) => updateManualJob('skills', e.target.value)} className={inputClass} />
            </Field>
          </div>
          <div className="md:col-span-2">
            <Field label="Job description" htmlFor="jobDescription">
              <textarea id="jobDescription" rows={5} value={manualJob.description} onChange={(e) => updateManualJob('description', e.target.value)} className={inputClass} />
            </Field>
          </div>
        </div>
      )}
      <button
        type="button"
        onClick={handleSaveJob}
        disabled={busy || (jobMode === 'posting' ? !jobSource.trim() : !manualJobComplete)}
        className="flex items-center gap-2 text-sm font-medium text-blue-600 hover:text-blue-800 disabled:text-gray-400"
      >
        <Briefcase className="w-4 h-4" /> {jobMode === 'posting' ? 'Extract job details' : 'Save job details'}
      </button>
      {job && (
        <div className="bg-blue-50/50 p-4 rounded-lg border border-blue-100 text-sm">
          <p className="font-semibold text-blue-800">{job.title} at {job.company}</p>
          {job.location && <p className="text-gray-600">{job.location}</p>}
          {job.skills.length > 0 && <p className="text-gray-600 mt-1">Skills: {job.skills.join(', ')}</p>}
        </div>
      )}
    </div>
  );

  const needsProfile = !profile && (
    <p className="text-sm text-gray-500">Save your profile first.</p>
  );

  return (
    <div className="min-h-screen bg-gray-50 p-4 md:p-8">
      <div className="max-w-5xl mx-auto space-y-8">

        {/* Header */}
        <header className="flex items-center justify-between pb-6 border-b border-gray-200">
          <div className="flex items-center gap-3">
            <div className="p-3 bg-blue-600 rounded-lg shadow-lg">
              <Briefcase className="w-8 h-8 text-white" />
            </div>
            <div>
              <h1 className="text-2xl font-bold text-gray-900">{status?.system.appName ?? 'Job Application Assistant'}</h1>
              <p className="text-sm text-gray-500">Cover letters, motivation letters and interview prep from a local model</p>
            </div>
          </div>
          <div className="flex items-center gap-3 text-sm">
            {models && (
              <span
                data-testid="model-status"
                className={`flex items-center gap-1 px-3 py-1 rounded-full font-medium ${activeModel ? 'bg-green-50 text-green-700' : 'bg-red-50 text-red-700'}`}
              >
                {activeModel ? <CheckCircle className="w-4 h-4" /> : <AlertCircle className="w-4 h-4" />}
                {activeModel ? `Ready: ${activeModel}` : 'No working model'}
              </span>
            )}
            <button
              onClick={() => void runHealthCheck()}
              disabled={checkingHealth}
              className="flex items-center gap-2 font-medium text-gray-600 hover:text-blue-600 transition-colors"
            >
              <RefreshCw className={`w-4 h-4 ${checkingHealth ? 'animate-spin' : ''}`} /> Check models
            </button>
          </div>
        </header>

        {/* Tabs */}
        <nav className="flex gap-2">
          {([
            ['profile', 'Profile', User],
            ['application', 'Application', FileText],
            ['interview', 'Interview', MessageSquare],
          ] as const).map(([id, label, Icon]) => (
            <button
              key={id}
              onClick={() => setTab(id)}
              className={`flex items-center gap-2 px-4 py-2 rounded-lg text-sm font-medium transition-colors ${
                tab === id ? 'bg-blue-600 text-white shadow' : 'bg-white text-gray-600 border border-gray-200 hover:text-blue-600'
              }`}
            >
              <Icon className="w-4 h-4" /> {label}
            </button>
          ))}
        </nav>

        <ErrorBanner message={errorMessage} />

        {tab === 'profile' && (
          <div className="bg-white rounded-xl shadow-sm border border-gray-100 p-6 md:p-8">
            <form onSubmit={handleProfileSubmit} className="space-y-6">
              <div className="grid grid-cols-1 md:grid-cols-2 gap-6">
                <div className="space-y-4">
                  <Field label="Full name" htmlFor="name">
                    <input id="name" value={name} onChange={(e) => setName(e.target.value)} className={inputClass} required />
                  </Field>
                  <Field label="Email" htmlFor="email">
                    <input id="email" type="email" value={email} onChange={(e) => setEmail(e.target.value)} className={inputClass} required />
                  </Field>
                  <Field label="Phone" htmlFor="phone">
                    <input id="phone" value={phone} onChange={(e) => setPhone(e.target.value)} className={inputClass} />
                  </Field>
                  <Field label="Key skills (comma-separated)" htmlFor="skills">
                    <input id="skills" value={skills} onChange={(e) => setSkills(e.target.value)} className={inputClass} />
                  </Field>
                </div>

                <div className="space-y-2">
                  <span className="block text-sm font-medium text-gray-700">Upload CV (PDF, DOCX, TXT, MD)</span>
                  <div
                    onClick={() => fileInputRef.current?.click()}
                    className="border-2 border-dashed border-gray-300 rounded-lg p-6 flex flex-col items-center justify-center cursor-pointer hover:border-blue-500 hover:bg-blue-50 transition-colors"
                  >
                    <Upload className="w-8 h-8 text-gray-400 mb-2" />
                    <p className="text-sm text-gray-600 font-medium">{cvFile ? cvFile.name : 'Click to upload your CV'}</p>
                    <input
                      type="file"
                      data-testid="cv-input"
                      ref={fileInputRef}
                      onChange={(e) => setCvFile(e.target.files?.[0] ?? null)}
                      accept=".pdf,.docx,.txt,.md"
                      className="hidden"
                    />
                  </div>
                  <p className="text-xs text-gray-400">Uploads are deleted as soon as the text is extracted.</p>
                  <Field label="Experience summary (used when no CV is uploaded)" htmlFor="experienceSummary">
                    <textarea
                      id="experienceSummary"
                      rows={5}
                      value={experienceSummary}
                      onChange={(e) => setExperienceSummary(e.target.value)}
                      className={inputClass}
                    />
                  </Field>
                </div>
              </div>
              <SubmitButton busy={busy} label="Save profile" />
            </form>

            {profile && (
              <div className="mt-6 bg-indigo-50 rounded-lg p-5">
                <h4 className="text-sm font-medium text-indigo-800 uppercase tracking-wider mb-3">Profile saved for {profile.name}</h4>
                <div className="flex flex-wrap gap-2">
                  {profile.skills.map((skill) => (
                    <span key={skill} className="px-3 py-1 bg-white text-indigo-600 text-xs font-medium rounded-full border border-indigo-100 shadow-sm">
                      {skill}
                    </span>
                  ))}
                </div>
              </div>
            )}
          </div>
        )}

        {tab === 'application' && (
          <div className="bg-white rounded-xl shadow-sm border border-gray-100 p-6 md:p-8 space-y-6">
            {needsProfile}
            {jobPanel}
            <form onSubmit={handleApplicationSubmit} className="space-y-4">
              <Field label={`Interest level (${preferences.jobInterestLevel})`} htmlFor="interest">
                <input
                  id="interest"
                  type="range"
                  min={1}
                  max={10}
                  value={preferences.jobInterestLevel}
                  onChange={(e) => updatePreference('jobInterestLevel', Number(e.target.value))}
                  className="w-full h-2 bg-gray-200 rounded-lg appearance-none cursor-pointer accent-blue-600"
                />
              </Field>
              <Field label="What excites you about this role?" htmlFor="motivation">
                <textarea id="motivation" rows={2} value={preferences.motivation} onChange={(e) => updatePreference('motivation', e.target.value)} className={inputClass} required />
              </Field>
              <Field label="Relevant experience" htmlFor="relevantExperience">
                <textarea id="relevantExperience" rows={2} value={preferences.relevantExperience} onChange={(e) => updatePreference('relevantExperience', e.target.value)} className={inputClass} required />
              </Field>
              <Field label="Career goals" htmlFor="careerGoals">
                <textarea id="careerGoals" rows={2} value={preferences.careerGoals} onChange={(e) => updatePreference('careerGoals', e.target.value)} className={inputClass} required />
              </Field>
              <Field label="What you know about the company" htmlFor="companyKnowledge">
                <textarea id="companyKnowledge" rows={2} value={preferences.companyKnowledge} onChange={(e) => updatePreference('companyKnowledge', e.target.value)} className={inputClass} />
              </Field>
              <SubmitButton busy={busy} label="Generate documents" disabled={!job || !profile} />
            </form>

            {application && (
              <div className="space-y-6">
                <div>
                  <h4 className="text-sm font-medium text-gray-500 uppercase tracking-wider mb-2">Job analysis</h4>
                  <p className="text-gray-700 leading-relaxed whitespace-pre-wrap">{application.analysis}</p>
                </div>
                {application.documents.map((document) => (
                  <div key={document.id} className="border border-gray-100 rounded-lg p-5">
                    <div className="flex items-center justify-between mb-3">
                      <h4 className="font-semibold text-gray-900">{document.title}</h4>
                      <button
                        onClick={() => void navigator.clipboard.writeText(document.content)}
                        className="flex items-center gap-1 text-xs font-medium text-gray-500 hover:text-blue-600"
                      >
                        <ClipboardCopy className="w-4 h-4" /> Copy
                      </button>
                    </div>
                    <p className="text-sm text-gray-700 leading-relaxed whitespace-pre-wrap">{document.content}</p>
                  </div>
                ))}
              </div>
            )}
          </div>
        )}

        {tab === 'interview' && (
          <div className="space-y-6">
            <div className="bg-white rounded-xl shadow-sm border border-gray-100 p-6 md:p-8 space-y-6">
              {needsProfile}
              {jobPanel}
              <form onSubmit={handleInterviewSubmit}>
                <SubmitButton busy={busy} label="Prepare for interview" disabled={!job || !profile} />
              </form>
            </div>

            {interview && (
              <div className="grid grid-cols-1 md:grid-cols-2 gap-6">
                <ListCard title="Confidence checklist" items={interview.confidenceChecklist} />
                <ListCard title="Technical topics" items={interview.technicalTopics} />
                <ListCard title="Technical questions" items={interview.technicalQuestions} />
                <ListCard title="Behavioral questions" items={interview.behavioralQuestions} />
                <ListCard title="Questions to ask" items={interview.questionsToAsk} />
                <ListCard
                  title="Preparation timeline"
                  items={Object.entries(interview.preparationTimeline).map(([period, tasks]) => `${period}: ${tasks.join(', ')}`)}
                />
              </div>
            )}
          </div>
        )}
      </div>
    </div>
  );
};

export default App;
