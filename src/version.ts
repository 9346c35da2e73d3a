export const SERVER_NAME = "trading-session";
export const SERVER_VERSION = "0.1.0";
