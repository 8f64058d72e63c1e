import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { getSector, routeByContractVersion } from "sector-registry";

import { isRecord } from "../core/field-path.js";
import type { InputsFor, ProjectInputs, Sector } from "../types/inputs.js";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export type ParseResult =
  | { success: true; sector: Sector; inputs: ProjectInputs }
  | { success: false; errors: string[] };

type AjvError = { instancePath?: string; message?: string };

type AjvValidateFunction = ((data: unknown) => boolean) & {
  errors?: AjvError[] | null;
};

type AjvValidator = {
  compile: (schema: unknown) => AjvValidateFunction;
};

let ajv: AjvValidator | null = null;
const validators = new Map<Sector, AjvValidateFunction>();

function getAjv(): AjvValidator {
  if (ajv) {
    return ajv;
  }
  const AjvConstructor = Ajv2020 as unknown as new (opts: Record<string, unknown>) => AjvValidator;
  const instance = new AjvConstructor({ strict: true, allErrors: true });
  const addFormatsPlugin = addFormats as unknown as (instance: AjvValidator) => void;
  addFormatsPlugin(instance);
  ajv = instance;
  return instance;
}

function getValidator(sector: Sector): AjvValidateFunction {
  const cached = validators.get(sector);
  if (cached) {
    return cached;
  }

  const rootDir = join(dirname(fileURLToPath(import.meta.url)), "..", "..", "..", "..");
  const schemaPath = join(rootDir, "contracts", getSector(sector).schemaFile);
  const schema: unknown = JSON.parse(readFileSync(schemaPath, "utf8"));

  const validate = getAjv().compile(schema);
  validators.set(sector, validate);
  return validate;
}

function describeErrors(errors: AjvError[] | null | undefined): string[] {
  return (errors ?? []).map((error) => {
    const path = error.instancePath && error.instancePath.length > 0 ? error.instancePath : "/";
    const message = error.message ?? "invalid";
    return `${path}: ${message}`;
  });
}

export function validateInputs(sector: Sector, data: unknown): ValidationResult {
  try {
    const validate = getValidator(sector);
    if (validate(data)) {
      return { valid: true, errors: [] };
    }
    return { valid: false, errors: describeErrors(validate.errors) };
  } catch (error) {
    return {
      valid: false,
      errors: [error instanceof Error ? error.message : "Validation failed"],
    };
  }
}

export function isInputsFor<S extends Sector>(sector: S, data: unknown): data is InputsFor<S> {
  return validateInputs(sector, data).valid;
}

/**
 * Validates a `{ contract: { contract_version }, inputs }` request envelope
 * and routes it to its sector by contract version.
 */
export function parseInputs(request: unknown): ParseResult {
  if (!isRecord(request)) {
    return { success: false, errors: ["/: request must be an object"] };
  }

  const contract = request.contract;
  const contractVersion = isRecord(contract) ? contract.contract_version : undefined;
  if (typeof contractVersion !== "string") {
    return { success: false, errors: ["/contract/contract_version: must be a string"] };
  }

  const route = routeByContractVersion(contractVersion);
  if (!route) {
    return {
      success: false,
      errors: [`/contract/contract_version: unknown contract version ${contractVersion}`],
    };
  }

  const inputs = request.inputs;
  if (isInputsFor(route.sector, inputs)) {
    return { success: true, sector: route.sector, inputs };
  }

  const errors = validateInputs(route.sector, inputs).errors.map((e) =>
    e.startsWith("/:") ? `/inputs${e.slice(1)}` : `/inputs${e}`,
  );
  return { success: false, errors };
}
