import { Request, Response } from "express";
import { SearchVideosUseCase } from "../../application/use-cases/search-videos.use-case";
import { QueryValidationError, SearchError } from "../../domain/errors/search.errors";
import { ANY_SUB_CATEGORY, DEFAULT_CATEGORY } from "../../domain/constants/categories";
import { readNumber, readString, toSearchParams, toSearchResponse } from "../dto/search.dto";
import { DashboardForm, DashboardOutcome, renderDashboardPage } from "../views/dashboard.page";

export interface DashboardDefaults {
  minSimilarity: number;
  maxCandidates: number;
}

export class SearchController {
  constructor(
    private searchVideosUseCase: SearchVideosUseCase,
    private dashboardDefaults: DashboardDefaults
  ) {}

  async search(req: Request, res: Response): Promise<void> {
    try {
      const params = toSearchParams(req.body);
      const result = await this.searchVideosUseCase.execute(params);
      res.json(toSearchResponse(result));
    } catch (error) {
      if (error instanceof SearchError) {
        res.status(error.status).json({ error: error.message });
        return;
      }
      console.error("[SearchController] Unexpected search failure:", error);
      res.status(500).json({ error: "Failed to search video segments" });
    }
  }

  async dashboard(req: Request, res: Response): Promise<void> {
    const q = readString(req.query.q);
    let form: DashboardForm = {
      query: q ?? "",
      minSimilarity: this.dashboardDefaults.minSimilarity,
      maxCandidates: this.dashboardDefaults.maxCandidates,
      category: readString(req.query.category) ?? DEFAULT_CATEGORY,
      subCategory: readString(req.query.subCategory) ?? ANY_SUB_CATEGORY,
    };

    // No query parameter: first visit, render the empty form
    if (q === undefined) {
      res.type("html").send(renderDashboardPage(form));
      return;
    }

    let outcome: DashboardOutcome;
    let status = 200;
    try {
      form = {
        ...form,
        minSimilarity: readNumber(req.query.minSimilarity, "minSimilarity") ?? form.minSimilarity,
        maxCandidates: readNumber(req.query.maxCandidates, "maxCandidates") ?? form.maxCandidates,
      };

      if (!q.trim()) {
        outcome = { kind: "warning", message: "Please enter a search phrase first." };
      } else {
        const result = await this.searchVideosUseCase.execute({
          query: q,
          minSimilarity: form.minSimilarity,
          maxCandidates: form.maxCandidates,
          category: { category: form.category, subCategory: form.subCategory },
        });
        outcome =
          result.status === "ok"
            ? { kind: "results", result }
            : { kind: "empty", minSimilarity: result.minSimilarity };
      }
    } catch (error) {
      if (error instanceof QueryValidationError) {
        status = error.status;
        outcome = { kind: "warning", message: error.message };
      } else if (error instanceof SearchError) {
        status = error.status;
        outcome = { kind: "error", message: error.message };
      } else {
        console.error("[SearchController] Unexpected dashboard failure:", error);
        status = 500;
        outcome = { kind: "error", message: "Internal server error" };
      }
    }

    res.status(status).type("html").send(renderDashboardPage(form, outcome));
  }
}
