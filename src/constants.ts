// src/constants.ts
export const CLI_NAME = "debrid-ledger";

export const ENV_PREFIX = "DEBRID_LEDGER_";
