export * from "./agents/agent-resolver";
export * from "./agents/zone-agents";
export * from "./availability/interval";
export * from "./availability/slot-generation";
export * from "./availability/types";
export * from "./messages/format-message";
export * from "./pipeline/outcomes";
export * from "./pipeline/types";
export * from "./policies/rules";
export * from "./repo/credential-repo";
export * from "./services/showing-availability-service";
