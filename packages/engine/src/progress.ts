import {
  MILESTONES,
  unlockedKindsAt,
  type Milestone,
  type PlatformKindT,
  type ScoringSettingsT,
  type UnlockHeights,
} from '@skyclimb/game-spec';

import type { Camera } from './camera';
import type { ProgressSnapshot } from './generator';

export interface ProgressStatistics {
  currentHeight: number;
  maxHeight: number;
  score: number;
  milestonesReached: number;
  totalMilestones: number;
  platformsLandedOn: number;
  bouncesPerformed: number;
  hazardsAvoided: number;
  progressPercentage: number;
}

/**
 * Climb height, score and milestones. Height is read off the camera, so it
 * only grows while the camera moves up. Score is the best height times the
 * multiplier plus every bonus earned so far.
 */
export class ProgressTracker {
  currentHeight = 0;
  maxHeight = 0;

  private bonus = 0;
  private readonly reached = new Set<number>();
  private landings = 0;
  private bounces = 0;
  private hazardsAvoided = 0;

  constructor(
    private readonly scoring: ScoringSettingsT,
    private readonly unlockHeights: UnlockHeights,
    private readonly milestones: readonly Milestone[] = MILESTONES,
  ) {}

  get score(): number {
    return Math.floor(this.maxHeight * this.scoring.heightMultiplier) + this.bonus;
  }

  /** Reads the camera height and returns the milestones first reached on this call. */
  update(camera: Camera): Milestone[] {
    this.currentHeight = Math.abs(camera.y);
    if (this.currentHeight > this.maxHeight) {
      this.maxHeight = this.currentHeight;
    }
    return this.checkMilestones();
  }

  checkMilestones(): Milestone[] {
    const fresh: Milestone[] = [];
    for (const milestone of this.milestones) {
      if (this.maxHeight >= milestone.height && !this.reached.has(milestone.height)) {
        this.reached.add(milestone.height);
        this.bonus += this.scoring.milestoneBonus;
        fresh.push(milestone);
      }
    }
    return fresh;
  }

  progressPercentage(targetHeight = this.scoring.targetHeight): number {
    return Math.min(100, (this.currentHeight / targetHeight) * 100);
  }

  nextMilestone(): Milestone | null {
    const pending = this.milestones
      .filter((milestone) => !this.reached.has(milestone.height))
      .sort((a, b) => a.height - b.height);
    return pending[0] ?? null;
  }

  recordLanding(kind: PlatformKindT): void {
    this.landings += 1;
    if (kind === 'bouncy') {
      this.bounces += 1;
    }
  }

  recordHazardAvoided(): void {
    this.hazardsAvoided += 1;
    this.bonus += this.scoring.hazardAvoidedBonus;
  }

  /** Progress as the generator sees it: the best height, never the current one. */
  snapshot(): ProgressSnapshot {
    return {
      height: this.maxHeight,
      unlockedKinds: unlockedKindsAt(this.maxHeight, this.unlockHeights),
    };
  }

  statistics(): ProgressStatistics {
    return {
      currentHeight: this.currentHeight,
      maxHeight: this.maxHeight,
      score: this.score,
      milestonesReached: this.reached.size,
      totalMilestones: this.milestones.length,
      platformsLandedOn: this.landings,
      bouncesPerformed: this.bounces,
      hazardsAvoided: this.hazardsAvoided,
      progressPercentage: this.progressPercentage(),
    };
  }

  reset(): void {
    this.currentHeight = 0;
    this.maxHeight = 0;
    this.bonus = 0;
    this.reached.clear();
    this.landings = 0;
    this.bounces = 0;
    this.hazardsAvoided = 0;
  }
}
