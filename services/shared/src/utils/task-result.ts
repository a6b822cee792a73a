import type {
     AgentName,
     ErrorDetail,
     NextAction,
     TaskResult,
} from '../types/task.types';
import { toErrorDetail } from './errors';

export function succeeded(
     taskId: string,
     agent: AgentName,
     payload: Record<string, unknown>,
     nextActions: NextAction[] = []
): TaskResult {
     return { taskId, agent, status: 'success', payload, errors: [], nextActions };
}

export function pending(
     taskId: string,
     agent: AgentName,
     payload: Record<string, unknown>,
     nextActions: NextAction[] = []
): TaskResult {
     return { taskId, agent, status: 'pending', payload, errors: [], nextActions };
}

export function failed(
     taskId: string,
     agent: AgentName,
     code: string,
     message: string,
     details: Record<string, unknown> = {},
     nextActions: NextAction[] = []
): TaskResult {
     const error: ErrorDetail = { code, message, details };
     return { taskId, agent, status: 'failed', payload: {}, errors: [error], nextActions };
}

export function failedFromError(
     taskId: string,
     agent: AgentName,
     error: unknown,
     nextActions: NextAction[] = []
): TaskResult {
     return {
          taskId,
          agent,
          status: 'failed',
          payload: {},
          errors: [toErrorDetail(error)],
          nextActions,
     };
}

export function askCustomer(message: string, data: Record<string, unknown> = {}): NextAction {
     return { type: 'ASK_CUSTOMER', message, data };
}

export function callAgent(message: string, data: Record<string, unknown> = {}): NextAction {
     return { type: 'CALL_AGENT', message, data };
}

export function notifyCustomer(message: string, data: Record<string, unknown> = {}): NextAction {
     return { type: 'NOTIFY_CUSTOMER', message, data };
}

export function assertNever(value: never): never {
     throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
