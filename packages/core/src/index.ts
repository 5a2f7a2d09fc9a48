export * from "./lib/actuator/actuator.js";
export * from "./lib/actuator/events.js";
export * from "./lib/actuator/poll.js";
export * from "./lib/bootstrap-token.js";
export * from "./lib/config.js";
export * from "./lib/controller/reconciler.js";
export * from "./lib/controller/service.js";
export * from "./lib/errors.js";
export * from "./lib/logging/logger.js";
export * from "./lib/machine/provider-spec.js";
export * from "./lib/machine/types.js";
export * from "./lib/openstack/addresses.js";
export * from "./lib/openstack/client.js";
export * from "./lib/openstack/types.js";
export * from "./lib/runtime/concurrency.js";
export * from "./lib/store/sqlite-store.js";
export * from "./lib/store/types.js";
export * from "./lib/userdata/container-linux-config.js";
export * from "./lib/userdata/postprocess.js";
export * from "./lib/userdata/resolve.js";
export * from "./lib/userdata/template.js";
