export const TOOL_NAME = "polygate";
export const TOOL_VERSION = "0.1.0";
