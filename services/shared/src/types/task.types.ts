// Request/response envelope shared by every component

export type TaskStatus = 'success' | 'failed' | 'pending';

export type AgentName =
     | 'inventory'
     | 'payment'
     | 'fulfillment'
     | 'loyalty'
     | 'recommendation'
     | 'post_purchase';

export interface ErrorDetail {
     code: string;
     message: string;
     details: Record<string, unknown>;
}

export type NextActionType = 'ASK_CUSTOMER' | 'CALL_AGENT' | 'NOTIFY_CUSTOMER';

export interface NextAction {
     type: NextActionType;
     message?: string;
     data: Record<string, unknown>;
}

/**
 * One request to a component. `TRequest` is a `{ type, payload }` union, so a
 * `Task<InventoryRequest>` narrows its payload when `type` is switched on.
 */
export type Task<TRequest extends { type: string; payload: unknown }> = Readonly<TRequest> & {
     readonly taskId: string;
     readonly sessionId: string;
     readonly customerId?: string;
};

export interface TaskResult<TPayload = Record<string, unknown>> {
     taskId: string;
     agent: AgentName;
     status: TaskStatus;
     payload: TPayload;
     errors: ErrorDetail[];
     nextActions: NextAction[];
}

export interface Agent<TRequest extends { type: string; payload: unknown }> {
     readonly name: AgentName;
     handle(task: Task<TRequest>): Promise<TaskResult>;
}
