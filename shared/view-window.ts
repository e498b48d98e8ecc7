import type { ScrollbarState, ViewMode, ViewWindowState, WindowBounds } from "./schema";

export const MIN_ZOOM_SPAN = 5;

const EMPTY_BOUNDS: WindowBounds = { xMin: -1, xMax: 1 };

/**
 * Pan/zoom/scroll state for one run's chart.
 *
 * Full view always spans `[0, maxFrame + 1]`. A span selection zooms into a
 * free window; scrolling the trailing edge within one chart range of the
 * newest frame locks the window to it, after which every `sync` slides the
 * window forward as frames arrive.
 */
export class ViewWindow {
  private xMin = 0;
  private xMax = 1;
  private yMax: number | null = null;
  private zoomActive = false;
  private lockToLatest = false;
  private chartRange: number | null = null;
  private scrollPosition = 0;

  constructor(private readonly minSpan = MIN_ZOOM_SPAN) {}

  get mode(): ViewMode {
    if (!this.zoomActive) {
      return "full";
    }
    return this.lockToLatest ? "zoomed-locked" : "zoomed-free";
  }

  /**
   * Zooms into a dragged span. Narrow spans are ignored and return false.
   */
  selectSpan(start: number, end: number): boolean {
    if (!Number.isFinite(start) || !Number.isFinite(end)) {
      return false;
    }
    const lo = Math.trunc(Math.min(start, end));
    const hi = Math.trunc(Math.max(start, end));
    if (hi - lo < this.minSpan) {
      return false;
    }
    this.chartRange = hi - lo;
    this.xMin = lo;
    this.xMax = hi;
    this.zoomActive = true;
    this.lockToLatest = false;
    this.scrollPosition = lo + this.chartRange / 2;
    return true;
  }

  /**
   * Zooms to a fixed-width window that follows the newest frame.
   */
  setChartRange(range: number): boolean {
    if (!Number.isFinite(range) || range <= 0) {
      return false;
    }
    this.chartRange = range;
    this.zoomActive = true;
    this.lockToLatest = true;
    return true;
  }

  /** Back to the initial full view, as if the run's history were newly arrived. */
  reset() {
    this.cancelZoom();
    this.scrollPosition = 0;
    this.yMax = null;
  }

  cancelZoom() {
    this.zoomActive = false;
    this.lockToLatest = false;
    this.chartRange = null;
  }

  /**
   * Recentres the zoomed window on `center`. Returns false outside zoom.
   * Locks once the trailing edge is within one chart range of `maxFrame`.
   */
  scroll(center: number, maxFrame: number | null): boolean {
    if (!this.zoomActive || this.chartRange === null || !Number.isFinite(center)) {
      return false;
    }
    const range = this.chartRange;
    const half = range / 2;
    if (center - half === 0) {
      this.xMin = 0;
      this.xMax = range;
    } else {
      this.xMin = center - half;
      this.xMax = center + half;
    }
    this.scrollPosition = center;
    this.lockToLatest = maxFrame !== null && this.xMax >= maxFrame - range;
    return true;
  }

  sync(maxFrame: number | null): WindowBounds {
    if (maxFrame === null) {
      if (!this.zoomActive) {
        this.xMin = EMPTY_BOUNDS.xMin;
        this.xMax = EMPTY_BOUNDS.xMax;
      }
      return this.bounds();
    }
    if (!this.zoomActive) {
      this.xMin = 0;
      this.xMax = maxFrame + 1;
    } else if (this.lockToLatest && this.chartRange !== null) {
      this.xMax = maxFrame;
      this.xMin = maxFrame - this.chartRange;
    }
    return this.bounds();
  }

  setYMax(yMax: number | null) {
    this.yMax = yMax;
  }

  bounds(): WindowBounds {
    return { xMin: this.xMin, xMax: this.xMax };
  }

  scrollbar(maxFrame: number | null): ScrollbarState | null {
    if (!this.zoomActive || this.chartRange === null) {
      return null;
    }
    const range = maxFrame ?? 0;
    return {
      position: this.lockToLatest ? range : this.scrollPosition,
      thumbSize: this.chartRange,
      range,
    };
  }

  state(): ViewWindowState {
    return {
      xMin: this.xMin,
      xMax: this.xMax,
      yMax: this.yMax,
      zoomActive: this.zoomActive,
      lockToLatest: this.lockToLatest,
      chartRange: this.chartRange,
    };
  }
}
