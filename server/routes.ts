import type { Express } from "express";
import { createServer, type Server } from "http";
import { z } from "zod";
import { listingFiltersSchema } from "@shared/schema";
import { DEFAULT_ADVERTISER_LIMIT, type ListingWithSnapshots } from "@shared/types/analytics";
import { errorMessage } from "./errors";
import type { IStorage } from "./storage";
import type { IngestionRunner } from "./services/ingestion-runner";

const advertiserQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(DEFAULT_ADVERTISER_LIMIT),
  is_owner: z.enum(["true", "false"]).transform((v) => v === "true").optional(),
});

const runQuerySchema = z.object({
  days_back: z.coerce.number().int().min(1).max(60).optional(),
});

export interface RouteDeps {
  storage: IStorage;
  runner: IngestionRunner;
}

export async function registerRoutes(app: Express, { storage, runner }: RouteDeps): Promise<Server> {
  // Listings routes
  app.get("/api/listings", async (req, res) => {
    const filters = listingFiltersSchema.safeParse(req.query);
    if (!filters.success) {
      return res.status(400).json({ message: "Invalid filters", errors: filters.error.flatten().fieldErrors });
    }

    try {
      const listings = await storage.getListings(filters.data);
      res.json(listings);
    } catch (error) {
      console.error("[API] Failed to fetch listings:", error);
      res.status(500).json({ message: "Failed to fetch listings" });
    }
  });

  app.get("/api/listings/:id", async (req, res) => {
    try {
      const listing = await storage.getListingById(req.params.id);
      if (!listing) {
        return res.status(404).json({ message: "Listing not found" });
      }
      const detail: ListingWithSnapshots = { ...listing, snapshots: await storage.getSnapshots(listing.id) };
      res.json(detail);
    } catch (error) {
      console.error("[API] Failed to fetch listing:", error);
      res.status(500).json({ message: "Failed to fetch listing" });
    }
  });

  // Analytics routes
  app.get("/api/analytics/advertisers", async (req, res) => {
    const query = advertiserQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ message: "Invalid query", errors: query.error.flatten().fieldErrors });
    }

    try {
      const advertisers = await storage.getTopAdvertisers(query.data);
      res.json(advertisers);
    } catch (error) {
      console.error("[API] Failed to fetch advertisers:", error);
      res.status(500).json({ message: "Failed to fetch advertisers" });
    }
  });

  app.get("/api/analytics/summary", async (_req, res) => {
    try {
      res.json(await storage.getSummary());
    } catch (error) {
      console.error("[API] Failed to fetch summary:", error);
      res.status(500).json({ message: "Failed to fetch summary" });
    }
  });

  app.get("/api/analytics/trends", async (_req, res) => {
    try {
      res.json(await storage.getTrends());
    } catch (error) {
      console.error("[API] Failed to fetch trends:", error);
      res.status(500).json({ message: "Failed to fetch trends" });
    }
  });

  // Ingestion routes
  app.post("/api/ingestion/run", (req, res) => {
    const query = runQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ message: "Invalid days_back", errors: query.error.flatten().fieldErrors });
    }
    if (runner.isRunning) {
      return res.status(409).json({ message: "An ingestion run is already in progress" });
    }

    // Runs in the background; progress is visible through /api/ingestion/status
    runner
      .runIngestion(query.data.days_back)
      .then((summary) => {
        console.log(`[API] Ingestion run ${summary.runId} finished: ${summary.status}`);
      })
      .catch((error: unknown) => {
        console.error(`[API] Ingestion run crashed: ${errorMessage(error)}`);
      });

    res.status(202).json({ status: "started", days_back: query.data.days_back ?? null });
  });

  app.get("/api/ingestion/status", async (_req, res) => {
    try {
      const latest = await storage.getLatestRunLog();
      if (!latest) {
        return res.json({ status: "no_runs_yet", running: runner.isRunning });
      }
      res.json({ ...latest, running: runner.isRunning, state: runner.state?.state ?? null });
    } catch (error) {
      console.error("[API] Failed to fetch ingestion status:", error);
      res.status(500).json({ message: "Failed to fetch ingestion status" });
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}
