export const SERVER_NAME = 'chess-uci-mcp';
export const SERVER_VERSION = '0.1.0';
