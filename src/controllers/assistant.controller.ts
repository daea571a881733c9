/**
 * Assistant Controller Module
 *
 * @module controllers/assistant
 */

import type { Request, Response } from 'express';

import type { AssistantService } from '../services/assistant.service.js';
import { HTTP_STATUS, generateCorrelationId, sendError, sendServiceResult } from '../utils/http.js';
import { isRecord, readString } from '../utils/validation.js';

/**
 * Assistant Controller Class
 */
export class AssistantController {
  constructor(private readonly assistantService: AssistantService) {}

  /**
   * POST /api/assistant/ask
   *
   * Request body: { employeeName: string, question: string }
   *
   * The completion call is aborted if the client goes away first.
   */
  async ask(req: Request, res: Response): Promise<void> {
    const correlationId = generateCorrelationId(req, 'assistant');
    const body: unknown = req.body;

    if (!isRecord(body)) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', 'Invalid request body');
      return;
    }

    const employeeName = readString(body, 'employeeName');
    const question = readString(body, 'question');

    if (!employeeName || !question) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', 'employeeName and question are required');
      return;
    }

    const abortController = new AbortController();
    const onClose = (): void => {
      if (!res.writableFinished) {
        abortController.abort();
      }
    };
    res.on('close', onClose);

    try {
      const result = await this.assistantService.ask(employeeName, question, {
        signal: abortController.signal,
        correlationId,
      });

      if (abortController.signal.aborted) {
        console.warn('[ASSISTANT_CONTROLLER] Client disconnected before answer:', {
          correlationId,
          timestamp: new Date().toISOString(),
        });
        return;
      }

      sendServiceResult(res, result);
    } finally {
      res.off('close', onClose);
    }
  }
}
