/**
 * Vacation Routes Module
 *
 * @module routes/vacation
 */

import { Router } from 'express';

import type { VacationController } from '../controllers/vacation.controller.js';
import { authenticate } from '../middleware/authenticate.js';
import { authorizeAdmin } from '../middleware/authorize.js';

/**
 * Create Vacation Router
 *
 * Every route needs a session; listing pending requests and deciding them
 * need an admin session.
 *
 * @example
 * app.use('/api/vacations', createVacationRouter(vacationController));
 */
export function createVacationRouter(vacationController: VacationController): Router {
  const router = Router();

  router.use(authenticate);

  router.post('/', (req, res, next) => {
    vacationController.submit(req, res).catch(next);
  });

  router.post('/validate', (req, res, next) => {
    vacationController.validate(req, res).catch(next);
  });

  router.get('/approved', (req, res, next) => {
    vacationController.approved(req, res).catch(next);
  });

  router.get('/employees/:name', (req, res, next) => {
    vacationController.history(req, res).catch(next);
  });

  router.get('/pending', authorizeAdmin(), (req, res, next) => {
    vacationController.pending(req, res).catch(next);
  });

  router.patch('/:id/approve', authorizeAdmin(), (req, res, next) => {
    vacationController.approve(req, res).catch(next);
  });

  router.patch('/:id/reject', authorizeAdmin(), (req, res, next) => {
    vacationController.reject(req, res).catch(next);
  });

  return router;
}
