import dotenv from "dotenv";

dotenv.config();

export const config = {
  portal: {
    // Base URL of the supplier portal (ExtJS single-page UI)
    url: process.env.PORTAL_URL || "https://portal.example.com/Ui/",
    username: process.env.PORTAL_USERNAME || "",
    password: process.env.PORTAL_PASSWORD || "",
    supplier: process.env.PORTAL_SUPPLIER || "",
  },
  browser: {
    headless: process.env.BOT_HEADLESS !== "false",
    executablePath: process.env.CHROME_EXECUTABLE_PATH || "",
    channel: process.env.CHROME_CHANNEL || "chrome",
    slowMo: parseInt(process.env.BOT_SLOW_MO || "0", 10),
    protocolTimeout: 300000, // 5 minutes, exports of large reports are slow
    profileDirectory: process.env.BOT_PROFILE_DIR || "./.bot-profile",
    cacheDirectory: process.env.BOT_CACHE_DIR || "",
  },
  run: {
    operationTimeoutSeconds: parseInt(
      process.env.BOT_OPERATION_TIMEOUT_SECONDS || "30",
      10,
    ),
    downloadDirectory: process.env.BOT_DOWNLOAD_DIR || "./downloads",
    collisionMode:
      process.env.BOT_COLLISION_MODE === "interactive"
        ? ("interactive" as const)
        : ("suffix" as const),
    logoutOnFinish: process.env.BOT_LOGOUT_ON_FINISH !== "false",
    loginRetryDelayMs: parseInt(
      process.env.BOT_LOGIN_RETRY_DELAY_MS || "5000",
      10,
    ),
  },
  logging: {
    level: process.env.LOG_LEVEL || "info",
    toFile: process.env.LOG_TO_FILE === "true",
  },
} as const;
