// Core services - Estado, layout, animación y orden
export { TabStateService } from './core/TabStateService';
export { LayoutService } from './core/LayoutService';
export { AnimationScheduler } from './core/AnimationScheduler';
export { Animation, DelayedStart, lerp } from './core/Animation';
export type { AnimationChannel, AnimationKind, AnimationOptions, SchedulerTask } from './core/Animation';
export { IntervalClock, ManualClock } from './core/clock';
export type { Clock } from './core/clock';
export { TabOrderingService } from './core/TabOrderingService';
export type { SortCriterion, UpdateOptions } from './core/TabOrderingService';

// UI services - Iconos y modo de salto
export { TabIconManager, BuiltinIconProvider } from './ui/TabIconManager';
export { JumpModeService } from './ui/JumpModeService';

// Registry services - Extensibilidad
export { CommandRegistry } from './registry/CommandRegistry';
export type { CommandHandler } from './registry/CommandRegistry';
