import express, { Application, Request, RequestHandler, Response } from "express";
import packageJson from "../package.json";

export interface AppOptions {
  webhook?: RequestHandler;
  startedAt?: Date;
}

export const formatUptime = (seconds: number): string => {
  return `${Math.floor(seconds / 3600)}h ${Math.floor((seconds % 3600) / 60)}m ${Math.floor(seconds % 60)}s`;
};

/**
 * HTTP surface of the bot: health checks for the host, plus the Telegram webhook when
 * the bot runs in webhook mode.
 */
export const createApp = (options: AppOptions = {}): Application => {
  const app: Application = express();
  const startedAt = options.startedAt ?? new Date();

  app.set("trust proxy", 1);
  app.use(express.json({ limit: "1mb" }));

  if (options.webhook) {
    app.use(options.webhook);
  }

  app.get("/health", (req: Request, res: Response) => {
    res.status(200).json({
      status: "OK",
      message: "Card Lead Bot is running",
      timestamp: new Date().toISOString(),
    });
  });

  // Catch-all route for undefined endpoints (including root)
  app.get("*", (req: Request, res: Response) => {
    const uptimeSeconds = (Date.now() - startedAt.getTime()) / 1000;

    res.status(200).json({
      success: true,
      message: "🤖 Card Lead Bot",
      status: "✅ Bot is up and running",
      data: {
        service: packageJson.name,
        version: packageJson.version,
        environment: process.env.NODE_ENV || "development",
        timestamp: new Date().toISOString(),
        uptime: formatUptime(uptimeSeconds),
      },
    });
  });

  return app;
};
