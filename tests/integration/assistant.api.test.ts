/**
 * Assistant API Integration Tests
 */

import request from 'supertest';
import { describe, it, expect } from 'vitest';

import { UserRole } from '../../src/types/index.js';
import { bearer, buildTestApp } from '../helpers/testApp.js';

describe('Assistant API', () => {
  it('should answer a question for a known employee', async () => {
    const { app, completion } = buildTestApp({ assistantEnabled: true });

    const response = await request(app)
      .post('/api/assistant/ask')
      .set('Authorization', bearer(UserRole.Employee))
      .send({ employeeName: 'Kim', question: '다음 주에 쉴 수 있나요?' });

    expect(response.status).toBe(200);
    expect(response.body.data).toEqual({
      employeeName: 'Kim',
      question: '다음 주에 쉴 수 있나요?',
      answer: '이번 주에는 휴가가 가능합니다.',
    });
    expect(completion.complete).toHaveBeenCalledTimes(1);
  });

  it('should answer 503 when the assistant is not configured', async () => {
    const { app } = buildTestApp();

    const response = await request(app)
      .post('/api/assistant/ask')
      .set('Authorization', bearer(UserRole.Employee))
      .send({ employeeName: 'Kim', question: 'question' });

    expect(response.status).toBe(503);
    expect(response.body.code).toBe('ASSISTANT_DISABLED');
  });

  it('should require a name and a question', async () => {
    const { app } = buildTestApp({ assistantEnabled: true });

    const response = await request(app)
      .post('/api/assistant/ask')
      .set('Authorization', bearer(UserRole.Employee))
      .send({ employeeName: 'Kim' });

    expect(response.status).toBe(400);
    expect(response.body.message).toBe('employeeName and question are required');
  });

  it('should answer 404 for an unknown employee', async () => {
    const { app } = buildTestApp({ assistantEnabled: true });

    const response = await request(app)
      .post('/api/assistant/ask')
      .set('Authorization', bearer(UserRole.Employee))
      .send({ employeeName: 'Choi', question: 'question' });

    expect(response.status).toBe(404);
  });
});
