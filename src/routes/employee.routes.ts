/**
 * Employee Routes Module
 *
 * @module routes/employee
 */

import { Router } from 'express';

import type { VacationController } from '../controllers/vacation.controller.js';
import { authenticate } from '../middleware/authenticate.js';

export function createEmployeeRouter(vacationController: VacationController): Router {
  const router = Router();

  router.use(authenticate);

  router.get('/', (req, res, next) => {
    vacationController.employees(req, res).catch(next);
  });

  router.get('/:name/balance', (req, res, next) => {
    vacationController.balance(req, res).catch(next);
  });

  return router;
}
