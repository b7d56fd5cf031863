import express from "express";

import type { CountriesController } from "../controllers/countries.controller";

export function createCountryRouter(controller: CountriesController) {
  const router = express.Router();

  router.get("/countries", controller.getAllCountries);
  router.post("/countries/refresh", controller.refreshData);

  router.get("/status", controller.getStatus);
  // Must be registered before /countries/:name
  router.get("/countries/image", controller.getSummaryImage);

  router.get("/countries/:name", controller.getCountryByName);
  router.delete("/countries/:name", controller.deleteCountryByName);

  return router;
}
