// index.ts — public entry point of the rotary focus engine

export * from './platform/lifecycle.js';
export * from './platform/events.js';
export * from './platform/clock.js';

export * from './view/viewTypes.js';
export { View } from './view/view.js';
export { ViewGroup } from './view/viewGroup.js';
export { ViewWindow } from './view/viewWindow.js';
export type { ViewWindowOptions } from './view/viewWindow.js';

export * from './rotary/rotaryErrors.js';
export * from './rotary/rotaryConstants.js';
export * from './rotary/rotaryCache.js';
export * from './rotary/rotarySettings.js';
export * from './rotary/focusUtils.js';
export { FocusRegion } from './rotary/focusRegion.js';
export type { FocusRegionOptions, NudgeShortcut, RelativeInsets } from './rotary/focusRegion.js';
export { FocusSink } from './rotary/focusSink.js';
export type { FocusSinkOptions, IInputMethodController } from './rotary/focusSink.js';
export * from './rotary/focusFinder.js';
export * from './rotary/rotaryNavigator.js';

export * from './configuration/configurationTypes.js';
export { ConfigurationRegistry } from './configuration/configurationRegistry.js';
export type { ConfigurationSchemaChangeEvent } from './configuration/configurationRegistry.js';
export { ConfigurationService } from './configuration/configurationService.js';
export * from './configuration/rotaryConfiguration.js';
