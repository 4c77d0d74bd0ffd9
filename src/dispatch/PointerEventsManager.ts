import { PointerEventsError } from "../core/errors";
import { NOOP_LOGGER, type Logger } from "../types/contracts";
import type { PointerWindow } from "./HostWindow";
import { PointerEvents, type PointerEventsOptions } from "./PointerEvents";

export interface PointerEventsManagerOptions extends PointerEventsOptions {
  /** Window resolved by `events()`. */
  defaultWindow?: PointerWindow;
  /** Overrides how dispatchers are built, e.g. to decorate them. */
  createEvents?: (window: PointerWindow, options: PointerEventsOptions) => PointerEvents;
}

/**
 * Registry of one `PointerEvents` per window.
 *
 * Create one at application start and pass it to whatever needs pointer
 * input. Dispatchers are created on first lookup and kept until the window is
 * removed with `removeWindow`. The registry is meant to be used from the
 * thread that drives the UI loop only.
 */
export class PointerEventsManager {
  private readonly byWindow = new Map<PointerWindow, PointerEvents>();
  private readonly defaultWindow: PointerWindow | undefined;
  private readonly eventsOptions: PointerEventsOptions;
  private readonly createEvents: (window: PointerWindow, options: PointerEventsOptions) => PointerEvents;
  private readonly logger: Logger;

  constructor(options: PointerEventsManagerOptions = {}) {
    const { defaultWindow, createEvents, ...eventsOptions } = options;
    this.defaultWindow = defaultWindow;
    this.eventsOptions = eventsOptions;
    this.createEvents = createEvents ?? ((window, opts) => new PointerEvents(window, opts));
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  get windowCount(): number {
    return this.byWindow.size;
  }

  hasWindow(window: PointerWindow): boolean {
    return this.byWindow.has(window);
  }

  /** Returns the window's dispatcher, creating it on first access. */
  eventsForWindow(window: PointerWindow): PointerEvents {
    const existing = this.byWindow.get(window);
    if (existing) return existing;

    const events = this.createEvents(window, this.eventsOptions);
    this.byWindow.set(window, events);
    this.logger.debug("Created pointer events for window", { windowId: window.id });
    return events;
  }

  /**
   * Disposes the window's dispatcher and forgets it. Returns false when the
   * window had none.
   */
  removeWindow(window: PointerWindow): boolean {
    const existing = this.byWindow.get(window);
    if (!existing) return false;

    existing.dispose();
    this.byWindow.delete(window);
    this.logger.debug("Removed pointer events for window", { windowId: window.id });
    return true;
  }

  /** Dispatcher of the default window, created on first access. */
  events(): PointerEvents {
    if (!this.defaultWindow) {
      throw new PointerEventsError("NO_DEFAULT_WINDOW", "PointerEventsManager has no default window configured");
    }
    return this.eventsForWindow(this.defaultWindow);
  }

  /** Like `eventsForWindow`, but fails instead of creating a dispatcher. */
  requireEventsForWindow(window: PointerWindow): PointerEvents {
    const existing = this.byWindow.get(window);
    if (!existing) {
      this.logger.error("No PointerEvents available for window", { windowId: window.id });
      throw new PointerEventsError("UNREGISTERED_WINDOW", `No PointerEvents registered for window ${window.id}`);
    }
    return existing;
  }
}
