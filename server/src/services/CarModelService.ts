/**
 * CarModelService.ts
 *
 * Car signature to model name table, read from a JSON file at startup and
 * served to the recorder at GET /cars.
 */

import fs from 'fs';
import { z } from 'zod';
import type { CarModelsResponse } from '../../../shared/api';

const carModelsSchema = z.record(z.string().min(1), z.string().min(1));

export class CarModelService {
  private models: CarModelsResponse;

  constructor(models: CarModelsResponse) {
    this.models = { ...models };
  }

  /**
   * @throws {Error} If the file is missing or is not a signature -> name object
   */
  static fromFile(filePath: string): CarModelService {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    const models = carModelsSchema.parse(raw);
    console.log(`[CARS] Loaded ${Object.keys(models).length} car model(s) from ${filePath}`);
    return new CarModelService(models);
  }

  getAll(): CarModelsResponse {
    return { ...this.models };
  }

  getName(signature: string): string | null {
    return Object.prototype.hasOwnProperty.call(this.models, signature) ? this.models[signature] : null;
  }
}
