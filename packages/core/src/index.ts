export * from "./errors";

export * from "./store/SessionStore";
export * from "./store/MapSessionStore";

export * from "./session/LockProvider";

export * from "./logging/createLogger";
export * from "./config/loadParlorConfig";

export * from "./utils/time";
