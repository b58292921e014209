import type { Express } from "express";
import { TRANSPORT_MODES } from "@hubline/types";
import { MODE_TAGS } from "@hubline/builder";
import type { ModesResponse } from "../models/responses.js";

export function registerModeRoutes(app: Express): void {
  app.get("/api/modes", (_req, res) => {
    const body: ModesResponse = {
      modes: TRANSPORT_MODES.map((mode) => ({ mode, tags: MODE_TAGS[mode] })),
    };
    res.json(body);
  });
}
