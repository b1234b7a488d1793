/**
 * @holdfast/client - Observer side of state sync
 */

export { ShadowWorld, DEFAULT_SHADOW_OPTIONS } from './ShadowWorld';
export type { ShadowUnit, Ghost, ShadowVision, ShadowWorldOptions, RemovalReason } from './ShadowWorld';
export { ObserverClient } from './ObserverClient';
export type { ObserverClientOptions, ObserverSocket } from './ObserverClient';
