export * from "./chat-request";
export * from "./comparison";
export * from "./dataset";
export * from "./errors";
export * from "./usage";
