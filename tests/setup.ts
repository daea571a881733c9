/**
 * Global test setup for Vitest
 *
 * Runs before every test file. Secrets are placeholders; the GitHub and
 * Gemini endpoints are never contacted because tests either inject the
 * in-memory document store or intercept HTTP with msw.
 */

import { afterEach } from 'vitest';

import { resetAssistantConfig } from '../src/config/assistant.js';
import { resetAuthConfig } from '../src/config/auth.js';
import { resetStoreConfig } from '../src/config/store.js';

process.env.NODE_ENV = 'test';
process.env.APP_PASSWORD = 'test-password';
process.env.ADMIN_PASSWORD = 'test-admin-password';
process.env.JWT_SECRET = 'test-secret';
process.env.GITHUB_TOKEN = 'test-token';
process.env.GITHUB_OWNER = 'test-owner';
process.env.GITHUB_REPO = 'test-repo';
process.env.GITHUB_API_URL = 'https://github.test';
process.env.GEMINI_API_URL = 'https://gemini.test';
delete process.env.GOOGLE_API_KEY;
delete process.env.GITHUB_BRANCH;

afterEach(() => {
  resetAuthConfig();
  resetStoreConfig();
  resetAssistantConfig();
});
