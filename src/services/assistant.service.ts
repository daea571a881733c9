/**
 * Assistant Service Module
 *
 * Answers free-form questions about leave. The prompt carries the asking
 * employee's balance and history, the leave policy and the exclusion
 * constraints; the model's reply is returned as-is and never changes state.
 *
 * @module services/assistant
 */

import type { ServiceOperationResult } from '../types/index.js';
import type { ExclusionConstraint, VacationRequest } from '../types/vacation.js';
import { getErrorCode, getErrorMessage, serviceFailure as failure } from '../utils/errors.js';
import type { CompletionClient } from './completion.service.js';
import { remainingLeave } from './eligibility.service.js';
import type { SnapshotCache, VacationSnapshot } from './snapshot.service.js';

/**
 * Longest question accepted, in characters
 */
export const MAX_QUESTION_LENGTH = 2000;

const ASSISTANT_INSTRUCTIONS = [
  '당신은 우리 회사의 친절하고 유능한 휴가 담당 챗봇입니다.',
  "아래 '사용자 정보 및 규정'을 바탕으로 사용자의 질문에 대해 명확하고 간결하게 답변해주세요.",
  '휴가 신청을 도와달라고 하면, 필요한 정보를 확인하고 신청 절차를 안내해주세요.',
].join('\n');

/**
 * Facts about the asking employee and the policy
 */
export interface AssistantContext {
  readonly employeeName: string;
  readonly remainingLeave: number;
  readonly history: readonly VacationRequest[];
  readonly dailyLimit: number;
  readonly constraints: readonly ExclusionConstraint[];
}

export interface AssistantAnswer {
  readonly employeeName: string;
  readonly question: string;
  readonly answer: string;
}

export interface AskOptions {
  readonly signal?: AbortSignal;
  readonly correlationId?: string;
}

/**
 * Gather the context for an employee, or null if they are unknown
 */
export function buildAssistantContext(snapshot: VacationSnapshot, employeeName: string): AssistantContext | null {
  const remaining = remainingLeave(snapshot, employeeName);
  if (remaining === null) {
    return null;
  }

  return {
    employeeName,
    remainingLeave: remaining,
    history: snapshot.requestsFor(employeeName),
    dailyLimit: snapshot.dailyLimit,
    constraints: snapshot.constraints(),
  };
}

export function renderAssistantContext(context: AssistantContext): string {
  const historyLines =
    context.history.length > 0
      ? context.history.map(
          (request) =>
            `  - ${request.startDate} ~ ${request.endDate} | ${request.leaveType} | ${request.status} | 신청일 ${request.requestDate ?? '-'}`
        )
      : ['  (내역 없음)'];

  const constraintLines =
    context.constraints.length > 0
      ? context.constraints.map((constraint) => `  - ${constraint.employeeName1}, ${constraint.employeeName2}`)
      : ['  (없음)'];

  return [
    `- 현재 사용자: ${context.employeeName}`,
    `- 남은 연차: ${context.remainingLeave}일`,
    '- 사용자의 휴가 내역:',
    ...historyLines,
    '- 회사 휴가 규정: 연차는 자유롭게 사용 가능. 병가 신청 시에는 진단서 등 증빙 서류가 필요할 수 있음. ' +
      `반차 2회는 연차 1일로 계산됨. 일일 최대 휴가 인원은 ${context.dailyLimit}명으로 제한됨.`,
    '- 동시 휴가 불가 정책:',
    ...constraintLines,
  ].join('\n');
}

export function buildAssistantPrompt(context: AssistantContext, question: string): string {
  return [
    ASSISTANT_INSTRUCTIONS,
    '',
    '---',
    '[사용자 정보 및 규정]',
    renderAssistantContext(context),
    '---',
    '',
    '[사용자 질문]',
    question,
  ].join('\n');
}

/**
 * Assistant Service Class
 */
export class AssistantService {
  constructor(
    private readonly cache: SnapshotCache,
    private readonly completion: CompletionClient
  ) {}

  get enabled(): boolean {
    return this.completion.enabled;
  }

  async ask(employeeName: string, question: string, options?: AskOptions): Promise<ServiceOperationResult<AssistantAnswer>> {
    const startTime = Date.now();
    const cid = options?.correlationId || `assistant_${Date.now()}`;
    const trimmedQuestion = question.trim();

    try {
      if (!this.completion.enabled) {
        return failure(startTime, 'Assistant is not configured', 'ASSISTANT_DISABLED');
      }

      if (trimmedQuestion.length === 0) {
        return failure(startTime, 'Question is required', 'VALIDATION_ERROR');
      }
      if (trimmedQuestion.length > MAX_QUESTION_LENGTH) {
        return failure(startTime, `Question must not exceed ${MAX_QUESTION_LENGTH} characters`, 'VALIDATION_ERROR');
      }

      const snapshot = await this.cache.get();
      const context = buildAssistantContext(snapshot, employeeName);

      if (!context) {
        return failure(startTime, `Unknown employee: ${employeeName}`, 'EMPLOYEE_NOT_FOUND');
      }

      console.log('[ASSISTANT_SERVICE] Asking assistant:', {
        employeeName,
        questionLength: trimmedQuestion.length,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      const answer = await this.completion.complete(buildAssistantPrompt(context, trimmedQuestion), {
        signal: options?.signal,
      });

      const executionTimeMs = Date.now() - startTime;

      console.log('[ASSISTANT_SERVICE] Assistant answered:', {
        employeeName,
        answerLength: answer.length,
        executionTimeMs,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return {
        success: true,
        data: { employeeName, question: trimmedQuestion, answer },
        executionTimeMs,
      };
    } catch (error) {
      const executionTimeMs = Date.now() - startTime;
      const errorMessage = getErrorMessage(error);

      console.error('[ASSISTANT_SERVICE] Assistant request failed:', {
        employeeName,
        error: errorMessage,
        executionTimeMs,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return {
        success: false,
        error: errorMessage,
        errorCode: getErrorCode(error),
        executionTimeMs,
      };
    }
  }
}
