/**
 * Admin Routes Module
 *
 * @module routes/admin
 */

import { Router } from 'express';

import type { AdminController } from '../controllers/admin.controller.js';
import { authenticate } from '../middleware/authenticate.js';
import { authorizeAdmin } from '../middleware/authorize.js';

export function createAdminRouter(adminController: AdminController): Router {
  const router = Router();

  router.use(authenticate, authorizeAdmin());

  router.get('/policy', (req, res, next) => {
    adminController.policy(req, res).catch(next);
  });

  router.put('/policy/daily-limit', (req, res, next) => {
    adminController.setDailyLimit(req, res).catch(next);
  });

  router.post('/employees', (req, res, next) => {
    adminController.addEmployee(req, res).catch(next);
  });

  router.delete('/employees/:name', (req, res, next) => {
    adminController.removeEmployee(req, res).catch(next);
  });

  router.post('/constraints', (req, res, next) => {
    adminController.addConstraint(req, res).catch(next);
  });

  router.delete('/constraints', (req, res, next) => {
    adminController.removeConstraint(req, res).catch(next);
  });

  return router;
}
