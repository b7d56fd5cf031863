import express, { type Express } from "express";

import {
  createCountriesController,
  type CountriesControllerDeps,
} from "./controllers/countries.controller";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { createCountryRouter } from "./routes/countries.routes";

export type AppDeps = CountriesControllerDeps;

export function createApp(deps: AppDeps): Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use("/", createCountryRouter(createCountriesController(deps)));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
