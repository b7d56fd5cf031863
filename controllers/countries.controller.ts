import type { NextFunction, Request, Response } from "express";
import { z } from "zod";

import {
  ORDERING_FIELDS,
  type CountryOrdering,
  type CountryQuery,
  type OrderingField,
} from "../models/country";
import type { CountryStore } from "../repositories/countries.repository";
import type { RefreshService } from "../services/refresh.service";
import { NotFoundError, ValidationError } from "../utils/errors";
import { readSummaryImage } from "../utils/generateSummaryImage";

export interface CountriesControllerDeps {
  store: CountryStore;
  refreshService: RefreshService;
  summaryImagePath: string;
}

const optionalFilter = z.string().trim().min(1).optional();

export const ListQuerySchema = z.object({
  region: optionalFilter,
  currency_code: optionalFilter,
  currency: optionalFilter,
  ordering: optionalFilter,
  sort: optionalFilter,
  limit: z.coerce.number().int().min(1).max(250).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

function isOrderingField(value: string): value is OrderingField {
  const fields: readonly string[] = ORDERING_FIELDS;
  return fields.includes(value);
}

export function parseOrdering(value: string): CountryOrdering {
  const descending = value.startsWith("-");
  const field = descending ? value.slice(1) : value;
  if (!isOrderingField(field)) {
    throw new ValidationError("Invalid ordering", {
      ordering: `must be one of ${ORDERING_FIELDS.join(", ")}, optionally prefixed with "-"`,
    });
  }
  return { field, direction: descending ? "desc" : "asc" };
}

/**
 * Translate request query parameters into a store query.
 * `currency` and `sort=gdp_desc` are accepted as aliases.
 */
export function parseListQuery(raw: unknown): CountryQuery {
  const result = ListQuerySchema.safeParse(raw);
  if (!result.success) {
    const details: Record<string, string> = {};
    for (const issue of result.error.issues) {
      const field = issue.path.join(".");
      details[field === "" ? "query" : field] = issue.message;
    }
    throw new ValidationError("Invalid query parameters", details);
  }

  const { region, currency_code, currency, ordering, sort, limit, offset } =
    result.data;
  const query: CountryQuery = { limit, offset };

  if (region !== undefined) query.region = region;
  const code = currency_code ?? currency;
  if (code !== undefined) query.currency_code = code;

  if (ordering !== undefined) {
    query.ordering = parseOrdering(ordering);
  } else if (sort !== undefined) {
    if (sort !== "gdp_desc") {
      throw new ValidationError("Invalid sort", { sort: "must be gdp_desc" });
    }
    query.ordering = { field: "estimated_gdp", direction: "desc" };
  }

  return query;
}

export function createCountriesController(deps: CountriesControllerDeps) {
  const { store, refreshService, summaryImagePath } = deps;

  async function refreshData(req: Request, res: Response, next: NextFunction) {
    try {
      const outcome = await refreshService.refresh();
      res.status(200).json(outcome);
    } catch (err) {
      next(err);
    }
  }

  async function getAllCountries(
    req: Request,
    res: Response,
    next: NextFunction
  ) {
    try {
      const query = parseListQuery(req.query);
      const countries = await store.list(query);
      res.status(200).json(countries);
    } catch (err) {
      next(err);
    }
  }

  async function getCountryByName(
    req: Request<{ name: string }>,
    res: Response,
    next: NextFunction
  ) {
    try {
      const country = await store.findByName(req.params.name);
      if (country === null) {
        throw new NotFoundError("Country not found");
      }
      res.status(200).json(country);
    } catch (err) {
      next(err);
    }
  }

  async function deleteCountryByName(
    req: Request<{ name: string }>,
    res: Response,
    next: NextFunction
  ) {
    try {
      const deleted = await store.deleteByName(req.params.name);
      if (!deleted) {
        throw new NotFoundError("Country not found");
      }
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  }

  async function getStatus(req: Request, res: Response, next: NextFunction) {
    try {
      res.status(200).json(await store.getStatus());
    } catch (err) {
      next(err);
    }
  }

  async function getSummaryImage(
    req: Request,
    res: Response,
    next: NextFunction
  ) {
    try {
      const image = await readSummaryImage(summaryImagePath);
      if (image === null) {
        res.status(404).json({ error: "Summary image not found" });
        return;
      }
      res.status(200).type("image/png").send(image);
    } catch (err) {
      next(err);
    }
  }

  return {
    refreshData,
    getAllCountries,
    getCountryByName,
    deleteCountryByName,
    getStatus,
    getSummaryImage,
  };
}

export type CountriesController = ReturnType<typeof createCountriesController>;
