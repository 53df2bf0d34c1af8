import { Router } from 'express';

import type { LeaveService } from '@services/leave/leave.service.js';

import { leaveHandlers } from '../controllers/leave.controller.js';

export function createLeaveRoutes(leave: LeaveService): Router {
  const handlers = leaveHandlers(leave);
  const router = Router();
  router.post('/apply-leave', handlers.applyLeave);
  router.get('/leave-balance/:employeeId', handlers.getBalance);
  router.get('/leave-history/:employeeId', handlers.getHistory);
  router.get('/employees', handlers.listEmployees);
  router.get('/employees/:employeeId', handlers.getEmployee);
  router.get('/policies', handlers.listPolicies);
  return router;
}
