import { randomUUID } from 'crypto';

import type { NextFunction, Request, Response } from 'express';

import { BusinessRuleError, ConflictError } from '@core/errors/index.js';

import type { LeaveService } from '@services/leave/leave.service.js';
import { describeReason } from '@services/conversation/messages.js';

import { ApplyLeaveBodySchema, parseBody } from './request.validator.js';

type Handler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

function handle(fn: (req: Request, res: Response) => Promise<void>): Handler {
  return async (req, res, next) => {
    try {
      await fn(req, res);
    } catch (err) {
      next(err);
    }
  };
}

export function leaveHandlers(leave: LeaveService) {
  return {
    applyLeave: handle(async (req, res) => {
      const body = parseBody(ApplyLeaveBodySchema, req.body);
      const employee = await leave.getEmployee(body.emp_id);
      const result = await leave.validateAndCommit({
        id: randomUUID(),
        employeeId: employee.employeeId,
        leaveType: body.leave_type,
        startDate: body.from_date,
        endDate: body.to_date,
        ...(body.reason ? { note: body.reason } : {}),
      });

      if (result.kind === 'rejected') {
        throw new BusinessRuleError('Leave request rejected', {
          reasons: result.reasons,
          details: result.reasons.map(describeReason),
        });
      }
      if (result.kind === 'conflict') {
        throw new ConflictError('Balance changed concurrently, please retry', {
          attempts: result.attempts,
        });
      }
      res.status(201).json({ request: result.request, balance: result.balance });
    }),

    getBalance: handle(async (req, res) => {
      res.json(await leave.getBalance(req.params.employeeId));
    }),

    getHistory: handle(async (req, res) => {
      res.json(await leave.getHistory(req.params.employeeId));
    }),

    listEmployees: handle(async (_req, res) => {
      res.json(await leave.listEmployees());
    }),

    getEmployee: handle(async (req, res) => {
      res.json(await leave.getEmployee(req.params.employeeId));
    }),

    listPolicies: handle(async (_req, res) => {
      res.json(await leave.listPolicies());
    }),
  };
}
