import * as dotenv from "dotenv";
dotenv.config();

export const env = {
  MYSQL_HOST: process.env.MYSQL_HOST || "",
  MYSQL_PORT: Number(process.env.MYSQL_PORT || 3306),
  MYSQL_USER: process.env.MYSQL_USER || "decisioning_agent",
  MYSQL_PASSWORD: process.env.MYSQL_PASSWORD || "",
  MYSQL_DATABASE: process.env.MYSQL_DATABASE || "decisioning_heatwave",
  MYSQL_CONNECTION_TIMEOUT: Number(process.env.MYSQL_CONNECTION_TIMEOUT || 30),
  MYSQL_CONNECT_RETRIES: Number(process.env.MYSQL_CONNECT_RETRIES || 0),

  HEATWAVE_COST_THRESHOLD: Number(process.env.HEATWAVE_COST_THRESHOLD || 100000),

  // View lifecycle toggles
  AUTO_VIEW_OPTIMIZATION: (process.env.AUTO_VIEW_OPTIMIZATION || "true").toLowerCase() === "true",
  VIEW_PERFORMANCE_MONITORING:
    (process.env.VIEW_PERFORMANCE_MONITORING || "true").toLowerCase() === "true",

  CORS_ORIGIN: process.env.CORS_ORIGIN || "http://localhost:5173",
  PORT: Number(process.env.PORT_BACKEND || 8787)
};
