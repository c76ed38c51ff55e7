import type { ImageReference } from "../../types";

/**
 * Interface for boot image lookups.
 */
export interface IGceImageManager {
  /** Newest image in `family` within `sourceProject`. Not cached. */
  resolveBootImage(sourceProject: string, family: string): Promise<ImageReference>;
}
