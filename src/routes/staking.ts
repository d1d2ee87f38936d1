/**
 * Staking API Routes
 *
 * Admin, deposit/claim and read endpoints over a StakingEngine.
 * The calling principal is taken from the x-principal header.
 */

import { Hono, type Context } from 'hono';
import { z } from 'zod';
import { isPublicKey, publicKeySchema } from '../principal';
import {
  describeError,
  plainFields,
  type StakeRecord,
  type StakingEngine,
  type StakingError,
  type StakingErrorKind,
  type Tier,
} from '../staking';

export const PRINCIPAL_HEADER = 'x-principal';

const ERROR_STATUS: Record<StakingErrorKind, 400 | 403 | 409 | 502> = {
  NotOwner: 403,
  NotApproved: 403,
  InvalidTier: 400,
  ZeroAmount: 400,
  CooldownActive: 409,
  NoActiveStake: 409,
  StakeAlreadyClaimed: 409,
  StakeStillLocked: 409,
  TransferFailed: 502,
};

// ============ Schemas ============

const tierIdSchema = z.coerce.number().int().nonnegative();

// Decimal string or safe integer; zero passes so the engine reports ZeroAmount
const amountSchema = z
  .union([z.string().regex(/^\d+$/), z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER)])
  .transform((value) => BigInt(value));

const setTierSchema = z.object({
  tierId: tierIdSchema,
  rewardRateBasisPoints: z.number().int().nonnegative(),
  lockDuration: z.number().int().nonnegative(),
});

const whitelistSchema = z.object({
  principal: publicKeySchema,
  approved: z.boolean(),
});

const depositSchema = z.object({
  tierId: tierIdSchema,
  amount: amountSchema,
});

const claimSchema = z.object({
  tierId: tierIdSchema,
});

// ============ Serialization ============

export function serializeRecord(record: StakeRecord) {
  return {
    stakedAmount: record.stakedAmount.toString(),
    accruedReward: record.accruedReward.toString(),
    unlockTimestamp: record.unlockTimestamp,
    claimed: record.claimed,
  };
}

function serializeTier(tierId: number, tier: Tier) {
  return {
    tierId,
    rewardRateBasisPoints: tier.rewardRateBasisPoints,
    rewardPercent: `${tier.rewardRateBasisPoints / 100}%`,
    lockDuration: tier.lockDuration,
    configured: tierId > 0 && tier.lockDuration > 0,
  };
}

function failure(c: Context, error: StakingError) {
  return c.json(
    {
      success: false,
      error: error.kind,
      message: describeError(error),
      details: plainFields(error),
    },
    ERROR_STATUS[error.kind]
  );
}

async function readBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return null;
  }
}

// ============ Routes ============

export function createStakingRoutes(engine: StakingEngine): Hono {
  const staking = new Hono();

  const callerOf = (c: Context): string | null => {
    const caller = c.req.header(PRINCIPAL_HEADER);
    return caller && isPublicKey(caller) ? caller : null;
  };

  const unauthenticated = (c: Context) =>
    c.json({ success: false, error: `Missing or invalid ${PRINCIPAL_HEADER} header` }, 401);

  // ============ Tier Info ============

  staking.get('/tiers', (c) => {
    return c.json({
      success: true,
      tiers: engine.listTiers().map(({ tierId, ...tier }) => serializeTier(tierId, tier)),
    });
  });

  staking.get('/tiers/:tierId', (c) => {
    const parsed = tierIdSchema.safeParse(c.req.param('tierId'));
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid tier id' }, 400);
    }

    return c.json({
      success: true,
      tier: serializeTier(parsed.data, engine.getTier(parsed.data)),
    });
  });

  // ============ Admin ============

  staking.post('/admin/tiers', async (c) => {
    const caller = callerOf(c);
    if (!caller) return unauthenticated(c);

    const parsed = setTierSchema.safeParse(await readBody(c));
    if (!parsed.success) {
      return c.json({
        success: false,
        error: 'Invalid request',
        details: parsed.error.flatten(),
      }, 400);
    }

    const { tierId, rewardRateBasisPoints, lockDuration } = parsed.data;
    const result = await engine.setTier(caller, tierId, rewardRateBasisPoints, lockDuration);
    if (!result.ok) return failure(c, result.error);

    return c.json({
      success: true,
      message: `Tier ${tierId} updated`,
      tier: serializeTier(tierId, result.value),
    });
  });

  staking.post('/admin/whitelist', async (c) => {
    const caller = callerOf(c);
    if (!caller) return unauthenticated(c);

    const parsed = whitelistSchema.safeParse(await readBody(c));
    if (!parsed.success) {
      return c.json({
        success: false,
        error: 'Invalid request',
        details: parsed.error.flatten(),
      }, 400);
    }

    const { principal, approved } = parsed.data;
    const result = await engine.setApproval(caller, principal, approved);
    if (!result.ok) return failure(c, result.error);

    return c.json({ success: true, principal, approved });
  });

  // ============ Staking Operations ============

  staking.post('/deposit', async (c) => {
    const caller = callerOf(c);
    if (!caller) return unauthenticated(c);

    const parsed = depositSchema.safeParse(await readBody(c));
    if (!parsed.success) {
      return c.json({
        success: false,
        error: 'Invalid request',
        details: parsed.error.flatten(),
      }, 400);
    }

    const { tierId, amount } = parsed.data;
    const result = await engine.deposit(caller, tierId, amount);
    if (!result.ok) return failure(c, result.error);

    const receipt = result.value;
    return c.json({
      success: true,
      message: `Staked ${receipt.amount} in tier ${tierId}`,
      deposit: {
        tierId,
        amount: receipt.amount.toString(),
        reward: receipt.reward.toString(),
        unlockTimestamp: receipt.unlockTimestamp,
      },
      position: serializeRecord(receipt.record),
    });
  });

  staking.post('/claim', async (c) => {
    const caller = callerOf(c);
    if (!caller) return unauthenticated(c);

    const parsed = claimSchema.safeParse(await readBody(c));
    if (!parsed.success) {
      return c.json({
        success: false,
        error: 'Invalid request',
        details: parsed.error.flatten(),
      }, 400);
    }

    const result = await engine.claim(caller, parsed.data.tierId);
    if (!result.ok) return failure(c, result.error);

    return c.json({
      success: true,
      message: `Claimed ${result.value.payout}`,
      tierId: result.value.tierId,
      payout: result.value.payout.toString(),
    });
  });

  // ============ Reads ============

  staking.get('/stakes/:principal/:tierId', (c) => {
    const principal = c.req.param('principal');
    const tierId = tierIdSchema.safeParse(c.req.param('tierId'));
    if (!isPublicKey(principal) || !tierId.success) {
      return c.json({ success: false, error: 'Invalid request' }, 400);
    }

    return c.json({
      success: true,
      principal,
      tierId: tierId.data,
      stake: serializeRecord(engine.getStakeDetails(principal, tierId.data)),
    });
  });

  staking.get('/principals/:principal', (c) => {
    const principal = c.req.param('principal');
    if (!isPublicKey(principal)) {
      return c.json({ success: false, error: 'Invalid principal' }, 400);
    }

    const state = engine.getPrincipalState(principal);
    const cooldownEndsAt =
      state.lastDepositTime === null ? null : state.lastDepositTime + engine.cooldownPeriod();

    return c.json({
      success: true,
      principal,
      ...state,
      isOwner: principal === engine.owner(),
      cooldownEndsAt,
    });
  });

  staking.get('/events', (c) => {
    return c.json({
      success: true,
      events: engine.events().map((event) => plainFields(event)),
    });
  });

  return staking;
}
