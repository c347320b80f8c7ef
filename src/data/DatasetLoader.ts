import { Dataset } from "../core/entities";

export interface DatasetLoader {
  /** Read the full event collection. Throws LoadError when it cannot. */
  load(): Dataset;
}
