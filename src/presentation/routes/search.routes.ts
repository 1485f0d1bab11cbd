import { Router } from "express";
import { SearchController } from "../controllers/search.controller";

export function createSearchRoutes(searchController: SearchController): Router {
  const router = Router();

  // Grouped results as JSON
  router.post("/search", (req, res) => searchController.search(req, res));

  return router;
}
