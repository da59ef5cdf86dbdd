import type { CameraSettingsT, PlayfieldT } from '@skyclimb/game-spec';

import type { Actor } from './actor';

export interface VerticalBounds {
  top: number;
  bottom: number;
}

/**
 * Vertical camera. `y` is the world coordinate of the top edge of the view
 * and only ever decreases: the view follows the actor upward and never back
 * down.
 */
export class Camera {
  y = 0;
  /** Lowest position the camera may take. */
  readonly maxY = 0;
  scrollSpeed: number;
  autoScroll: boolean;

  private readonly followOffset: number;

  constructor(
    private readonly playfield: PlayfieldT,
    private readonly settings: CameraSettingsT,
  ) {
    this.followOffset = playfield.height * settings.followRatio;
    this.scrollSpeed = settings.scrollSpeed;
    this.autoScroll = settings.autoScroll;
  }

  update(actor: Actor | null): void {
    if (this.autoScroll) {
      this.y -= this.scrollSpeed;
    }
    if (!actor) {
      return;
    }

    const target = actor.y - (this.playfield.height - this.followOffset);
    if (target < this.y) {
      this.y = target;
    }
    if (this.y > this.maxY) {
      this.y = this.maxY;
    }
  }

  worldToScreenY(worldY: number): number {
    return worldY - this.y;
  }

  screenToWorldY(screenY: number): number {
    return screenY + this.y;
  }

  isVisible(worldY: number, objectHeight = 0): boolean {
    const screenY = this.worldToScreenY(worldY);
    return screenY + objectHeight >= 0 && screenY <= this.playfield.height;
  }

  visibleBounds(): VerticalBounds {
    return { top: this.y, bottom: this.y + this.playfield.height };
  }

  /** World y of the bottom edge of the view. */
  screenBottomY(): number {
    return this.y + this.playfield.height;
  }

  setScrollSpeed(speed: number): void {
    this.scrollSpeed = Math.max(0, speed);
  }

  enableAutoScroll(enabled: boolean): void {
    this.autoScroll = enabled;
  }

  /** Distance scrolled up from the start. */
  scrollDistance(): number {
    return Math.abs(this.y);
  }

  /** True once the actor's feet are more than `margin` below the view. */
  isBelowScreen(actor: Actor, margin = this.settings.fallMargin): boolean {
    return actor.y + actor.height / 2 > this.screenBottomY() + margin;
  }

  reset(): void {
    this.y = 0;
    this.scrollSpeed = this.settings.scrollSpeed;
    this.autoScroll = this.settings.autoScroll;
  }
}
