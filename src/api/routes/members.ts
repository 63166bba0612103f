/**
 * Member Routes
 * Member lookup, renewal and the expiration sweep
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';

import type { LifecycleService, MemberService } from '@/services/index.js';
import type { Member } from '@/types/index.js';
import { MEMBER_NOT_FOUND_MESSAGE, PERMISSIONS } from '@/types/index.js';

import { requirePermission } from '../middleware/permission.js';
import {
  errorCodeResponse,
  errorResponse,
  getRequestId,
  successResponse,
} from '../utils/response.js';

interface MemberRoutesDeps {
  memberService: Pick<MemberService, 'getMember' | 'isActive'>;
  lifecycleService: Pick<
    LifecycleService,
    'renewSubscription' | 'deactivateExpiredMembers'
  >;
}

// Zod Schemas
const renewBodySchema = z.object({
  amount: z.number({ required_error: 'amount is required' }).finite(),
  durationDays: z
    .number({ required_error: 'durationDays is required' })
    .finite(),
});

/**
 * Serialize member for the wire
 */
function formatMember(member: Member) {
  return {
    id: member.id,
    displayName: member.displayName,
    isActive: member.isActive,
    subscriptionEnd:
      member.subscriptionEnd === null
        ? null
        : member.subscriptionEnd.toISOString(),
  };
}

async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return {};
  }
}

/**
 * Create member routes
 */
export function createMemberRoutes(deps: MemberRoutesDeps): Hono {
  const { memberService, lifecycleService } = deps;
  const app = new Hono();

  /**
   * POST /members/expire
   * Run the expiration sweep
   */
  app.post(
    '/members/expire',
    requirePermission(PERMISSIONS.MEMBERS_SWEEP),
    async (c) => {
      const requestId = getRequestId(c);

      const result = await lifecycleService.deactivateExpiredMembers();

      if (!result.success) {
        return errorResponse(c, result.error, requestId);
      }

      return successResponse(c, result.data, requestId);
    }
  );

  /**
   * GET /members/:memberId
   * Get a member
   */
  app.get(
    '/members/:memberId',
    requirePermission(PERMISSIONS.MEMBERS_READ),
    async (c) => {
      const requestId = getRequestId(c);
      const memberId = c.req.param('memberId');

      const result = await memberService.getMember(memberId);

      if (!result.success) {
        return errorResponse(c, result.error, requestId);
      }

      if (result.data === null) {
        return errorResponse(
          c,
          {
            code: 'NOT_FOUND',
            message: MEMBER_NOT_FOUND_MESSAGE,
            details: { memberId },
          },
          requestId
        );
      }

      return successResponse(c, formatMember(result.data), requestId);
    }
  );

  /**
   * GET /members/:memberId/active
   * Cached entitlement flag (false for unknown members)
   */
  app.get(
    '/members/:memberId/active',
    requirePermission(PERMISSIONS.MEMBERS_READ),
    async (c) => {
      const requestId = getRequestId(c);
      const memberId = c.req.param('memberId');

      const result = await memberService.isActive(memberId);

      if (!result.success) {
        return errorResponse(c, result.error, requestId);
      }

      return successResponse(c, { memberId, isActive: result.data }, requestId);
    }
  );

  /**
   * POST /members/:memberId/renew
   * Verify payment and extend the subscription
   */
  app.post(
    '/members/:memberId/renew',
    requirePermission(PERMISSIONS.MEMBERS_RENEW),
    async (c) => {
      const requestId = getRequestId(c);
      const memberId = c.req.param('memberId');

      const validation = renewBodySchema.safeParse(await readJsonBody(c));
      if (!validation.success) {
        return errorCodeResponse(
          c,
          'VALIDATION_ERROR',
          validation.error.issues[0]?.message ?? 'Invalid renewal request',
          requestId
        );
      }

      const { amount, durationDays } = validation.data;
      const result = await lifecycleService.renewSubscription(
        memberId,
        amount,
        durationDays
      );

      if (!result.success) {
        return errorResponse(c, result.error, requestId);
      }

      if (!result.data) {
        return errorCodeResponse(
          c,
          'PAYMENT_DECLINED',
          'Payment could not be verified',
          requestId
        );
      }

      return successResponse(c, { memberId, renewed: true }, requestId);
    }
  );

  return app;
}
