/**
 * Admin API Integration Tests
 */

import request from 'supertest';
import { describe, it, expect, beforeEach } from 'vitest';
import type { Express } from 'express';

import { UserRole } from '../../src/types/index.js';
import { TEST_PATHS, type MemoryDocumentStore } from '../helpers/memoryDocumentStore.js';
import { bearer, buildTestApp } from '../helpers/testApp.js';

describe('Admin API', () => {
  let app: Express;
  let documentStore: MemoryDocumentStore;
  let admin: string;

  beforeEach(() => {
    ({ app, documentStore } = buildTestApp());
    admin = bearer(UserRole.Admin);
  });

  describe('policy', () => {
    it('should return the daily limit and constraints', async () => {
      const response = await request(app).get('/api/admin/policy').set('Authorization', admin);

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        dailyLimit: 2,
        constraints: [{ employeeName1: 'Kim', employeeName2: 'Lee' }],
      });
    });

    it('should update the daily limit', async () => {
      const response = await request(app)
        .put('/api/admin/policy/daily-limit')
        .set('Authorization', admin)
        .send({ dailyLimit: 3 });

      expect(response.status).toBe(200);
      expect(response.body.data).toBe(3);
      expect(documentStore.content(TEST_PATHS.config)).toBe('{\n  "daily_limit": 3\n}');
    });

    it('should reject a missing or invalid limit', async () => {
      const missing = await request(app).put('/api/admin/policy/daily-limit').set('Authorization', admin).send({});
      const zero = await request(app)
        .put('/api/admin/policy/daily-limit')
        .set('Authorization', admin)
        .send({ dailyLimit: 0 });

      expect(missing.status).toBe(400);
      expect(missing.body.message).toBe('dailyLimit is required');
      expect(zero.status).toBe(400);
      expect(zero.body.message).toBe('Daily limit must be a positive integer');
    });
  });

  describe('employees', () => {
    it('should add an employee', async () => {
      const response = await request(app)
        .post('/api/admin/employees')
        .set('Authorization', admin)
        .send({ name: 'Choi', totalLeaveDays: 12 });

      expect(response.status).toBe(201);
      expect(response.body.data).toEqual({ name: 'Choi', totalLeaveDays: 12 });
    });

    it('should answer 409 for an existing name', async () => {
      const response = await request(app).post('/api/admin/employees').set('Authorization', admin).send({ name: 'Kim' });

      expect(response.status).toBe(409);
      expect(response.body.code).toBe('EMPLOYEE_EXISTS');
    });

    it('should reject a non-numeric allocation', async () => {
      const response = await request(app)
        .post('/api/admin/employees')
        .set('Authorization', admin)
        .send({ name: 'Choi', totalLeaveDays: 'many' });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('totalLeaveDays must be a number');
    });

    it('should remove an employee', async () => {
      const response = await request(app).delete('/api/admin/employees/Lee').set('Authorization', admin);

      expect(response.status).toBe(200);
      expect(documentStore.content(TEST_PATHS.employees)).toBe('employee_name,total_leave_days\nKim,15\nPark,10\n');
    });
  });

  describe('constraints', () => {
    it('should add a new pair with 201 and an existing one with 200', async () => {
      const created = await request(app)
        .post('/api/admin/constraints')
        .set('Authorization', admin)
        .send({ employeeName1: 'Park', employeeName2: 'Lee' });
      const existing = await request(app)
        .post('/api/admin/constraints')
        .set('Authorization', admin)
        .send({ employeeName1: 'Lee', employeeName2: 'Park' });

      expect(created.status).toBe(201);
      expect(existing.status).toBe(200);
      expect(existing.body.data.created).toBe(false);
    });

    it('should remove a pair', async () => {
      const response = await request(app)
        .delete('/api/admin/constraints')
        .set('Authorization', admin)
        .send({ employeeName1: 'Lee', employeeName2: 'Kim' });

      expect(response.status).toBe(200);
      expect(documentStore.content(TEST_PATHS.constraints)).toBe('employee_name_1,employee_name_2\n');
    });

    it('should answer 404 for a missing pair', async () => {
      const response = await request(app)
        .delete('/api/admin/constraints')
        .set('Authorization', admin)
        .send({ employeeName1: 'Kim', employeeName2: 'Park' });

      expect(response.status).toBe(404);
      expect(response.body.code).toBe('CONSTRAINT_NOT_FOUND');
    });

    it('should require both names', async () => {
      const response = await request(app)
        .post('/api/admin/constraints')
        .set('Authorization', admin)
        .send({ employeeName1: 'Kim' });

      expect(response.status).toBe(400);
    });
  });

  describe('POST /api/cache/invalidate', () => {
    it('should make external edits visible before the snapshot expires', async () => {
      await request(app).get('/api/admin/policy').set('Authorization', admin);
      documentStore.seed(TEST_PATHS.config, '{"daily_limit": 7}');

      const stale = await request(app).get('/api/admin/policy').set('Authorization', admin);
      const invalidated = await request(app).post('/api/cache/invalidate').set('Authorization', admin);
      const fresh = await request(app).get('/api/admin/policy').set('Authorization', admin);

      expect(stale.body.data.dailyLimit).toBe(2);
      expect(invalidated.status).toBe(200);
      expect(invalidated.body.data).toEqual({ invalidated: true });
      expect(fresh.body.data.dailyLimit).toBe(7);
    });
  });
});
