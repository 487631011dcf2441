export const SERVER_NAME = 'linearb-readonly-mcp';
export const SERVER_VERSION = '1.0.0';
