import express, { Express } from "express";
import cors from "cors";
import { SearchController } from "./controllers/search.controller";
import { createSearchRoutes } from "./routes/search.routes";
import { errorMiddleware } from "./middleware/error.middleware";

export function createApp(searchController: SearchController): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get("/health", (req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // Interactive dashboard
  app.get("/", (req, res) => searchController.dashboard(req, res));

  // Routes
  app.use("/api", createSearchRoutes(searchController));

  // Error handling middleware
  app.use(errorMiddleware);

  return app;
}
