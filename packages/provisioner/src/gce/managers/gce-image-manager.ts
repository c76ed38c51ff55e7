/**
 * GCE Image Manager
 *
 * Resolves the newest image of a public image family.
 */

import type { ImagesClient } from "@google-cloud/compute";
import type { ImageReference, LogCallback } from "../types";
import type { IGceImageManager } from "./interfaces";

export type ImagesApi = Pick<ImagesClient, "getFromFamily">;

export class GceImageManager implements IGceImageManager {
  constructor(
    private readonly imagesClient: ImagesApi,
    private readonly log: LogCallback
  ) {}

  async resolveBootImage(sourceProject: string, family: string): Promise<ImageReference> {
    const [image] = await this.imagesClient.getFromFamily({
      project: sourceProject,
      family,
    });

    if (!image.selfLink) {
      throw new Error(`Image family ${sourceProject}/${family} returned an image without a self link`);
    }

    const name = image.name ?? image.selfLink.split("/").pop() ?? family;
    this.log(`Resolved ${sourceProject}/${family} to ${name}`, "stdout");
    return { name, selfLink: image.selfLink };
  }
}
