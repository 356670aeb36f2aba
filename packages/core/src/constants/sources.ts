export const SCHEMA_VERSION = "1.0.0";

export const PACKAGE_NAME = "animanga-lookup";

export const PACKAGE_VERSION = "0.1.0";

export const USER_AGENT = `${PACKAGE_NAME}/${PACKAGE_VERSION}`;

export const DEFAULT_MAX_PER_PAGE = 25;

export const DEFAULT_TIMEOUT_SEC = 15;

export const DEFAULT_RECOMMENDATIONS_CAP = 10;
