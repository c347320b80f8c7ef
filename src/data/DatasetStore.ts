import { Dataset } from "../core/entities";
import { DatasetLoader } from "./DatasetLoader";

/**
 * Holds the one dataset a process works on. The first `get()` loads it and
 * every later call returns the same instance; there is no reload short of a
 * new process. A failed load is not remembered, so the next call retries.
 */
export class DatasetStore {
  private dataset: Dataset | null = null;

  constructor(private readonly loader: DatasetLoader) {}

  get(): Dataset {
    if (this.dataset === null) {
      this.dataset = this.loader.load();
    }
    return this.dataset;
  }

  isLoaded(): boolean {
    return this.dataset !== null;
  }
}
