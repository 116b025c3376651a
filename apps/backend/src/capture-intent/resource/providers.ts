import type { GeoLocation } from "@intentcam/types";

/**
 * Device orientation in degrees clockwise (0, 90, 180, 270)
 */
export interface OrientationProvider {
  getOrientation(): number;
}

export interface LocationProvider {
  /** Null when location is unavailable or not permitted */
  getLocation(): GeoLocation | null;
}

export class FixedOrientationProvider implements OrientationProvider {
  private orientation: number;

  constructor(orientation = 0) {
    this.orientation = FixedOrientationProvider.normalize(orientation);
  }

  getOrientation(): number {
    return this.orientation;
  }

  setOrientation(degrees: number): void {
    this.orientation = FixedOrientationProvider.normalize(degrees);
  }

  /**
   * Snap to the nearest right angle in [0, 360)
   */
  static normalize(degrees: number): number {
    const snapped = Math.round(degrees / 90) * 90;
    return ((snapped % 360) + 360) % 360;
  }
}

export class FixedLocationProvider implements LocationProvider {
  constructor(private location: GeoLocation | null = null) {}

  getLocation(): GeoLocation | null {
    return this.location;
  }

  setLocation(location: GeoLocation | null): void {
    this.location = location;
  }
}
