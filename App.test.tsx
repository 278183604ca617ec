// @vitest-environment jsdom
import React from 'react';
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import App from './App';
import type { JobDescription, ModelStatus, StatusResponse, UserProfile } from './types';

const status = (models: Partial<ModelStatus> = {}): StatusResponse => ({
  system: {
    appName: 'Job Application Assistant',
    appVersion: '1.0.0',
    debugMode: false,
    ollamaUrl: 'http://localhost:11434',
    primaryModel: 'llama3.1:8b',
    fallbackModels: [],
  },
  models: {
    initialized: true,
    reachable: true,
    installedModels: ['llama3.1:8b', 'gemma2:9b'],
    modelHealth: { 'llama3.1:8b': true, 'gemma2:9b': true },
    primaryModel: 'llama3.1:8b',
    fallbackModels: ['gemma2:9b'],
    hasWorkingModel: true,
    activeModel: 'llama3.1:8b',
    ...models,
  },
});

const manualJob: JobDescription = {
  title: 'Platform Engineer',
  company: 'Initech',
  description: 'Run our clusters',
  requirements: [],
  skills: ['Kubernetes', 'Terraform'],
};

const savedProfile: UserProfile = {
  name: 'Sam Rivera',
  email: 'sam@example.com',
  cvText: '',
  skills: ['Go', 'Rust'],
  experience: [],
  education: [],
};

const reply = (body: unknown, ok = true) => ({ ok, status: ok ? 200 : 400, json: async () => body });

describe('App', () => {
  let routes: Record<string, ReturnType<typeof reply>>;
  const fetchMock = vi.fn(async (url: string, _init?: RequestInit) => {
    const response = routes[url];
    if (!response) throw new Error(`unexpected request to ${url}`);
    return response;
  });

  beforeEach(() => {
    fetchMock.mockClear();
    routes = { '/api/status': reply(status()) };
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    cleanup();
    vi.unstubAllGlobals();
  });

  it('shows the working model in the header', async () => {
    render(<App />);

    expect((await screen.findByTestId('model-status')).textContent).toBe('Ready: llama3.1:8b');
  });

  it('names the fallback that is serving when the primary is down', async () => {
    routes['/api/status'] = reply(
      status({ modelHealth: { 'llama3.1:8b': false, 'gemma2:9b': true }, activeModel: 'gemma2:9b' }),
    );

    render(<App />);

    expect((await screen.findByTestId('model-status')).textContent).toBe('Ready: gemma2:9b');
  });

  it('warns when no model works', async () => {
    routes['/api/status'] = reply(
      status({
        initialized: false,
        modelHealth: { 'llama3.1:8b': false, 'gemma2:9b': false },
        hasWorkingModel: false,
        activeModel: undefined,
      }),
    );

    render(<App />);

    expect((await screen.findByTestId('model-status')).textContent).toBe('No working model');
  });

  it('is not ready while the server refuses to hand out a model', async () => {
    routes['/api/status'] = reply(status({ initialized: false, activeModel: undefined }));

    render(<App />);

    expect((await screen.findByTestId('model-status')).textContent).toBe('No working model');
  });

  it('saves the profile form', async () => {
    routes['/api/profile'] = reply(savedProfile);
    render(<App />);

    fireEvent.change(screen.getByLabelText('Full name'), { target: { value: 'Sam Rivera' } });
    fireEvent.change(screen.getByLabelText('Email'), { target: { value: 'sam@example.com' } });
    fireEvent.change(screen.getByLabelText('Key skills (comma-separated)'), { target: { value: 'Go, Rust' } });
    fireEvent.change(screen.getByLabelText('Experience summary (used when no CV is uploaded)'), {
      target: { value: 'Six years of backend work' },
    });
    fireEvent.click(screen.getByRole('button', { name: 'Save profile' }));

    expect(await screen.findByText('Profile saved for Sam Rivera')).toBeDefined();
    expect(screen.getByText('Rust')).toBeDefined();

    const [url, init] = fetchMock.mock.calls.find(([called]) => called === '/api/profile') ?? [];
    expect(url).toBe('/api/profile');
    const form = init?.body;
    expect(form instanceof FormData && form.get('skills')).toBe('Go, Rust');
    expect(form instanceof FormData && form.get('cvText')).toBe('Six years of backend work');
  });

  it('saves a job entered by hand', async () => {
    routes['/api/job/manual'] = reply(manualJob);
    render(<App />);
    await screen.findByTestId('model-status');

    fireEvent.click(screen.getByRole('button', { name: /Application/ }));
    fireEvent.click(screen.getByLabelText('Enter manually'));
    const save = screen.getByRole('button', { name: 'Save job details' });
    expect(save.hasAttribute('disabled')).toBe(true);

    fireEvent.change(screen.getByLabelText('Job title'), { target: { value: 'Platform Engineer' } });
    fireEvent.change(screen.getByLabelText('Company name'), { target: { value: 'Initech' } });
    fireEvent.change(screen.getByLabelText('Job description'), { target: { value: 'Run our clusters' } });
    fireEvent.change(screen.getByLabelText('Required skills (one per line)'), {
      target: { value: 'Kubernetes\nTerraform' },
    });
    fireEvent.click(save);

    expect(await screen.findByText('Platform Engineer at Initech')).toBeDefined();
    expect(screen.getByText('Skills: Kubernetes, Terraform')).toBeDefined();

    const [, init] = fetchMock.mock.calls.find(([called]) => called === '/api/job/manual') ?? [];
    const body = init?.body;
    expect(typeof body === 'string' ? JSON.parse(body) : undefined).toEqual({
      title: 'Platform Engineer',
      company: 'Initech',
      description: 'Run our clusters',
      requirements: '',
      skills: 'Kubernetes\nTerraform',
      location: '',
    });
  });

  it('shows server errors with their details', async () => {
    routes['/api/profile'] = reply({ error: 'Invalid request', details: 'email: Invalid email' }, false);
    render(<App />);

    fireEvent.change(screen.getByLabelText('Full name'), { target: { value: 'Sam Rivera' } });
    fireEvent.change(screen.getByLabelText('Email'), { target: { value: 'sam@example.com' } });
    fireEvent.click(screen.getByRole('button', { name: 'Save profile' }));

    expect((await screen.findByRole('alert')).textContent).toBe('Invalid request: email: Invalid email');
  });

  it('keeps generation disabled until a profile and job exist', async () => {
    render(<App />);
    await screen.findByTestId('model-status');

    fireEvent.click(screen.getByRole('button', { name: /Application/ }));

    expect(screen.getByText('Save your profile first.')).toBeDefined();
    expect(screen.getByRole('button', { name: 'Generate documents' }).hasAttribute('disabled')).toBe(true);
  });
});
