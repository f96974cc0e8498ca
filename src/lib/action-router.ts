/**
 * Action Router
 *
 * Binds the configured gestures on a surface to session actions. Actions are
 * looked up in a fixed dispatch table, so an unrecognised name can only come
 * from a bad settings value; it is logged and left unbound.
 */

import { isAction } from './schemas/settings';
import { UnknownActionNameError, toErrorMessage } from './errors';
import type { ActiveAction, Gesture, Settings } from '../types/settings';
import type { GestureSurface, InputEvent, InputSignal } from '../types/collaborators';

/** What a routed action runs against, normally the active session */
export interface ActionTarget {
  keep: () => Promise<void>;
  reject: () => Promise<void>;
  next: () => Promise<void>;
  previous: () => Promise<void>;
  skip: () => Promise<void>;
}

export type GestureMappings = Partial<Record<Gesture, string>>;

const DISPATCH: Record<ActiveAction, (target: ActionTarget) => Promise<void>> = {
  keep: (target) => target.keep(),
  reject: (target) => target.reject(),
  next: (target) => target.next(),
  previous: (target) => target.previous(),
  skip: (target) => target.skip(),
};

const BUTTON_SIGNALS = {
  left_click: 'primary',
  right_click: 'secondary',
} as const satisfies Record<'left_click' | 'right_click', InputSignal>;

/**
 * Resolve a configured name to an action, or null for "no binding".
 * Unknown names are warned about and treated as disabled.
 */
export function resolveAction(name: string | undefined): ActiveAction | null {
  if (name === undefined) return null;
  if (!isAction(name)) {
    console.warn(`[Router] ${new UnknownActionNameError(name).message}, treating as disabled`);
    return null;
  }
  return name === 'disabled' ? null : name;
}

/**
 * Map any of the three wheel signals to a logical direction.
 * The combined signal carries a signed delta, positive meaning up.
 */
export function wheelDirection(event: InputEvent): 'wheel_up' | 'wheel_down' | null {
  switch (event.signal) {
    case 'wheel-up':
      return 'wheel_up';
    case 'wheel-down':
      return 'wheel_down';
    case 'wheel': {
      const delta = event.delta ?? 0;
      if (delta > 0) return 'wheel_up';
      if (delta < 0) return 'wheel_down';
      return null;
    }
    default:
      return null;
  }
}

export function toGestureMappings(settings: Settings): GestureMappings {
  return { ...settings.button_mappings, ...settings.wheel_mappings };
}

/** Instruction line shown above the image */
export function describeBindings(settings: Settings): string {
  const label = (action: string) => action.toUpperCase();
  const { left_click, right_click } = settings.button_mappings;
  const { wheel_up, wheel_down } = settings.wheel_mappings;
  return (
    `L-Click: ${label(left_click)}  |  R-Click: ${label(right_click)}  |  ` +
    `Wheel: ${label(wheel_up)}/${label(wheel_down)}`
  );
}

export class ActionRouter {
  private readonly bound = new Map<InputSignal, string>();

  constructor(
    private readonly surface: GestureSurface,
    private readonly target: ActionTarget
  ) {}

  /** Signals currently bound, with the action(s) each one triggers */
  get currentBindings(): ReadonlyMap<InputSignal, string> {
    return this.bound;
  }

  bindAll(settings: Settings): void {
    this.bindMappings(toGestureMappings(settings));
  }

  /** Release every bound signal, then bind the given mappings */
  bindMappings(mappings: GestureMappings): void {
    this.unbindAll();
    this.bindButtons(mappings);
    this.bindWheel(mappings);
  }

  unbindAll(): void {
    for (const signal of this.bound.keys()) {
      this.surface.unbind(signal);
    }
    this.bound.clear();
  }

  private bindButtons(mappings: GestureMappings): void {
    for (const gesture of ['left_click', 'right_click'] as const) {
      const action = resolveAction(mappings[gesture]);
      if (!action) continue;

      const signal = BUTTON_SIGNALS[gesture];
      this.surface.bind(signal, () => this.dispatch(action));
      this.bound.set(signal, action);
    }
  }

  private bindWheel(mappings: GestureMappings): void {
    const actions = {
      wheel_up: resolveAction(mappings.wheel_up),
      wheel_down: resolveAction(mappings.wheel_down),
    };
    if (!actions.wheel_up && !actions.wheel_down) return;

    const onWheel = (event: InputEvent) => {
      const direction = wheelDirection(event);
      const action = direction ? actions[direction] : null;
      if (action) this.dispatch(action);
    };

    this.surface.bind('wheel', onWheel);
    this.bound.set('wheel', `${actions.wheel_up ?? 'disabled'}/${actions.wheel_down ?? 'disabled'}`);

    if (actions.wheel_up) {
      this.surface.bind('wheel-up', onWheel);
      this.bound.set('wheel-up', actions.wheel_up);
    }
    if (actions.wheel_down) {
      this.surface.bind('wheel-down', onWheel);
      this.bound.set('wheel-down', actions.wheel_down);
    }
  }

  private dispatch(action: ActiveAction): void {
    DISPATCH[action](this.target).catch((error) => {
      console.error(`[Router] ${action} failed:`, toErrorMessage(error));
    });
  }
}
