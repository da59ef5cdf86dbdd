import { z } from 'zod';

/**
 * Per-tick actor physics. Units are pixels and pixels per tick; y grows
 * downward, so a negative jump velocity launches upward.
 */
export const ActorPhysics = z.object({
  gravity: z.number().gt(0).default(0.5),
  jumpVelocity: z.number().lt(0).default(-12),
  horizontalSpeed: z.number().gt(0).default(3),
  width: z.number().gt(0).default(32),
  height: z.number().gt(0).default(32),
  surfacePushFactor: z.number().min(0).default(0.5),
  maxSurfaceSpeed: z.number().gt(0).default(8),
  conveyorContactTolerance: z.number().min(0).default(2),
  landingOverlap: z.number().min(0).default(1),
});

export type ActorPhysicsT = z.infer<typeof ActorPhysics>;

export const DEFAULT_ACTOR_PHYSICS: ActorPhysicsT = ActorPhysics.parse({});

/** Apex height of a standing jump: v² / 2g. */
export function maxJumpHeight(physics: ActorPhysicsT): number {
  return (physics.jumpVelocity * physics.jumpVelocity) / (2 * physics.gravity);
}

/** Horizontal distance covered during a jump that lands at launch height. */
export function maxHorizontalReach(physics: ActorPhysicsT): number {
  const airborneTicks = (2 * Math.abs(physics.jumpVelocity)) / physics.gravity;
  return physics.horizontalSpeed * airborneTicks;
}
