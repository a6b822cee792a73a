import { z } from 'zod';
import type { FulfillmentRequest, FulfillmentService } from '../clients/fulfillment-service';
import type { LoyaltyRequest, LoyaltyService } from '../clients/loyalty-service';
import type { PaymentGateway, PaymentRequest } from '../clients/payment-gateway';
import type {
     PostPurchaseRequest,
     PostPurchaseService,
} from '../clients/post-purchase-service';
import type {
     RecommendationRequest,
     RecommendationService,
} from '../clients/recommendation-service';
import * as schemas from '../schemas/task.schemas';
import type { InventoryRequest } from '../types/inventory.types';
import type {
     Agent,
     AgentName,
     ErrorDetail,
     NextAction,
     Task,
     TaskResult,
     TaskStatus,
} from '../types/task.types';
import { MissingFieldsError, toErrorDetail } from '../utils/errors';
import { logger } from '../utils/logger';
import { assertNever } from '../utils/task-result';

export type DecodedTask =
     | { agent: 'inventory'; task: Task<InventoryRequest> }
     | { agent: 'payment'; task: Task<PaymentRequest> }
     | { agent: 'fulfillment'; task: Task<FulfillmentRequest> }
     | { agent: 'loyalty'; task: Task<LoyaltyRequest> }
     | { agent: 'recommendation'; task: Task<RecommendationRequest> }
     | { agent: 'post_purchase'; task: Task<PostPurchaseRequest> };

export type DecodeResult =
     | { ok: true; value: DecodedTask }
     | { ok: false; taskId: string | null; errors: ErrorDetail[] };

export interface WireNextAction {
     type: NextAction['type'];
     message: string | null;
     data: Record<string, unknown>;
}

export interface WireTaskResult {
     task_id: string | null;
     agent: AgentName | null;
     status: TaskStatus;
     payload: Record<string, unknown>;
     errors: ErrorDetail[];
     next_actions: WireNextAction[];
}

function issuePaths(error: z.ZodError, prefix: string): string[] {
     return [...new Set(error.issues.map((issue) => [prefix, ...issue.path].join('.')))];
}

function parsePayload<TSchema extends z.ZodTypeAny>(
     schema: TSchema,
     payload: Record<string, unknown>
): z.output<TSchema> {
     const parsed = schema.safeParse(payload);
     if (!parsed.success) {
          throw new MissingFieldsError(issuePaths(parsed.error, 'payload'));
     }
     return parsed.data;
}

/**
 * Validate a raw request envelope and narrow it to the request union of the
 * component that owns its type.
 */
export function decodeTask(raw: unknown): DecodeResult {
     const envelope = schemas.taskEnvelopeSchema.safeParse(raw);
     if (!envelope.success) {
          const fields = issuePaths(envelope.error, '').map((f) => f.replace(/^\./, '') || 'envelope');
          return {
               ok: false,
               taskId: null,
               errors: [toErrorDetail(new MissingFieldsError(fields))],
          };
     }

     const { task_id, type, session_id, customer_id, payload } = envelope.data;
     const base = { taskId: task_id, sessionId: session_id, customerId: customer_id };

     try {
          const value = decodeRequest(type, base, payload);
          if (!value) {
               return {
                    ok: false,
                    taskId: task_id,
                    errors: [
                         {
                              code: 'UNSUPPORTED_TASK',
                              message: `Unsupported task type: ${type}`,
                              details: { type },
                         },
                    ],
               };
          }
          return { ok: true, value };
     } catch (error) {
          return { ok: false, taskId: task_id, errors: [toErrorDetail(error)] };
     }
}

function decodeRequest(
     type: string,
     base: { taskId: string; sessionId: string; customerId?: string },
     payload: Record<string, unknown>
): DecodedTask | undefined {
     switch (type) {
          case 'INVENTORY_CHECK':
               return {
                    agent: 'inventory',
                    task: { ...base, type, payload: parsePayload(schemas.inventoryCheckSchema, payload) },
               };
          case 'INVENTORY_RESERVE':
               return {
                    agent: 'inventory',
                    task: { ...base, type, payload: parsePayload(schemas.inventoryReserveSchema, payload) },
               };
          case 'INVENTORY_RELEASE':
               return {
                    agent: 'inventory',
                    task: { ...base, type, payload: parsePayload(schemas.inventoryReleaseSchema, payload) },
               };
          case 'INVENTORY_RELEASE_ORDER':
               return {
                    agent: 'inventory',
                    task: {
                         ...base,
                         type,
                         payload: parsePayload(schemas.inventoryReleaseOrderSchema, payload),
                    },
               };
          case 'INVENTORY_GET':
               return {
                    agent: 'inventory',
                    task: { ...base, type, payload: parsePayload(schemas.inventoryGetSchema, payload) },
               };
          case 'PAYMENT_AUTHORIZE':
               return {
                    agent: 'payment',
                    task: { ...base, type, payload: parsePayload(schemas.paymentAuthorizeSchema, payload) },
               };
          case 'PAYMENT_CAPTURE':
               return {
                    agent: 'payment',
                    task: { ...base, type, payload: parsePayload(schemas.paymentCaptureSchema, payload) },
               };
          case 'PAYMENT_REFUND':
               return {
                    agent: 'payment',
                    task: { ...base, type, payload: parsePayload(schemas.paymentRefundSchema, payload) },
               };
          case 'PAYMENT_STATUS':
               return {
                    agent: 'payment',
                    task: { ...base, type, payload: parsePayload(schemas.paymentStatusSchema, payload) },
               };
          case 'FULFILLMENT_CREATE':
               return {
                    agent: 'fulfillment',
                    task: { ...base, type, payload: parsePayload(schemas.fulfillmentCreateSchema, payload) },
               };
          case 'FULFILLMENT_UPDATE_STATUS':
               return {
                    agent: 'fulfillment',
                    task: {
                         ...base,
                         type,
                         payload: parsePayload(schemas.fulfillmentUpdateStatusSchema, payload),
                    },
               };
          case 'FULFILLMENT_CANCEL':
               return {
                    agent: 'fulfillment',
                    task: { ...base, type, payload: parsePayload(schemas.fulfillmentCancelSchema, payload) },
               };
          case 'FULFILLMENT_GET':
               return {
                    agent: 'fulfillment',
                    task: { ...base, type, payload: parsePayload(schemas.fulfillmentGetSchema, payload) },
               };
          case 'LOYALTY_CALCULATE':
               return {
                    agent: 'loyalty',
                    task: { ...base, type, payload: parsePayload(schemas.loyaltyCalculateSchema, payload) },
               };
          case 'LOYALTY_REDEEM':
               return {
                    agent: 'loyalty',
                    task: { ...base, type, payload: parsePayload(schemas.loyaltyRedeemSchema, payload) },
               };
          case 'LOYALTY_ISSUE':
               return {
                    agent: 'loyalty',
                    task: { ...base, type, payload: parsePayload(schemas.loyaltyIssueSchema, payload) },
               };
          case 'LOYALTY_GET':
               return {
                    agent: 'loyalty',
                    task: { ...base, type, payload: parsePayload(schemas.loyaltyGetSchema, payload) },
               };
          case 'RECOMMEND_FOR_CART':
               return {
                    agent: 'recommendation',
                    task: { ...base, type, payload: parsePayload(schemas.recommendForCartSchema, payload) },
               };
          case 'RECOMMEND_ALTERNATIVES':
               return {
                    agent: 'recommendation',
                    task: {
                         ...base,
                         type,
                         payload: parsePayload(schemas.recommendAlternativesSchema, payload),
                    },
               };
          case 'RETURNS_INITIATE':
               return {
                    agent: 'post_purchase',
                    task: { ...base, type, payload: parsePayload(schemas.returnsInitiateSchema, payload) },
               };
          case 'RETURNS_STATUS':
          case 'RETURNS_RECEIVE':
               return {
                    agent: 'post_purchase',
                    task: { ...base, type, payload: parsePayload(schemas.returnIdSchema, payload) },
               };
          case 'FEEDBACK_SUBMIT':
               return {
                    agent: 'post_purchase',
                    task: { ...base, type, payload: parsePayload(schemas.feedbackSubmitSchema, payload) },
               };
          case 'WARRANTY_CHECK':
               return {
                    agent: 'post_purchase',
                    task: { ...base, type, payload: parsePayload(schemas.warrantyCheckSchema, payload) },
               };
          default:
               return undefined;
     }
}

export function encodeTaskResult(result: TaskResult): WireTaskResult {
     return {
          task_id: result.taskId,
          agent: result.agent,
          status: result.status,
          payload: result.payload,
          errors: result.errors,
          next_actions: result.nextActions.map((action) => ({
               type: action.type,
               message: action.message ?? null,
               data: action.data,
          })),
     };
}

export interface TaskRouterAgents {
     inventory: Agent<InventoryRequest>;
     payment: PaymentGateway;
     fulfillment: FulfillmentService;
     loyalty: LoyaltyService;
     recommendation: RecommendationService;
     postPurchase: PostPurchaseService;
}

/**
 * Single entry point for wire-format tasks: decode, hand to the owning
 * component, encode the reply.
 */
export class TaskRouter {
     constructor(private readonly agents: TaskRouterAgents) {}

     async dispatch(raw: unknown): Promise<WireTaskResult> {
          const decoded = decodeTask(raw);
          if (!decoded.ok) {
               logger.warn({ taskId: decoded.taskId, errors: decoded.errors }, 'Rejected task');
               return {
                    task_id: decoded.taskId,
                    agent: null,
                    status: 'failed',
                    payload: {},
                    errors: decoded.errors,
                    next_actions: [],
               };
          }

          return encodeTaskResult(await this.route(decoded.value));
     }

     private route(decoded: DecodedTask): Promise<TaskResult> {
          switch (decoded.agent) {
               case 'inventory':
                    return this.agents.inventory.handle(decoded.task);
               case 'payment':
                    return this.agents.payment.handle(decoded.task);
               case 'fulfillment':
                    return this.agents.fulfillment.handle(decoded.task);
               case 'loyalty':
                    return this.agents.loyalty.handle(decoded.task);
               case 'recommendation':
                    return this.agents.recommendation.handle(decoded.task);
               case 'post_purchase':
                    return this.agents.postPurchase.handle(decoded.task);
               default:
                    return assertNever(decoded);
          }
     }
}
