export * from "./types";
export * from "./errors";
export * from "./config";

export * from "./http/HttpContext";
export * from "./http/tokenCookie";

export * from "./store/SessionStore";
export * from "./store/MapSessionStore";
export * from "./store/CachedSessionStore";

export * from "./session/IdentifierGenerator";
export * from "./session/SessionSerializer";
export * from "./session/Session";

export * from "./SessionEngine";
