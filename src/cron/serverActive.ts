import cron, { ScheduledTask } from "node-cron";
import axios from "axios";

/**
 * Keep-alive Cron Job
 *
 * Free hosting tiers put idle services to sleep, which also stops the bot from polling.
 * Pings the public health URL every 14 minutes to keep the process awake.
 */
export const keepServerActive = (pingUrl: string): ScheduledTask | null => {
  if (!pingUrl) {
    console.log("ℹ️  SELF_PING_URL not set, keep-alive cron disabled");
    return null;
  }

  return cron.schedule("*/14 * * * *", async () => {
    try {
      const res = await axios.get(pingUrl, { timeout: 10000 });
      console.log(`🔁 Keep-alive ping ${pingUrl} -> ${res.status}`);
    } catch (error) {
      console.warn("⚠️ Keep-alive ping failed:", error instanceof Error ? error.message : String(error));
    }
  });
};

export default keepServerActive;
