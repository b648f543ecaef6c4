/**
 * @readycheck/docker - Container runtime queries
 */

export { DockerRuntime, type DockerRuntimeOptions } from './runtime.js';
export { dockerInspectSchema, dockerStateSchema, toContainerState, type DockerInspect } from './state.js';
