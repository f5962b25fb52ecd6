import { logger } from "../config/logger.js";
import type { ComputeBackend } from "./compute-backend.js";
import { FlavorNotFoundError, ImageNotFoundError } from "./errors.js";
import type { FlavorRecord, ImageRecord, Page } from "./types.js";

/** Read-only flavor lookups. */
export class FlavorService {
  constructor(private readonly backend: ComputeBackend) {}

  async get(flavorId: string): Promise<FlavorRecord> {
    const flavor = await this.backend.getFlavor(flavorId);
    if (!flavor) throw new FlavorNotFoundError(flavorId);
    logger.debug("Flavor fetched", { flavorId });
    return flavor;
  }

  async list(limit: number, offset: number): Promise<Page<FlavorRecord>> {
    const page = await this.backend.listFlavors(limit, offset);
    logger.debug("Flavors listed", { limit, offset, total: page.total });
    return page;
  }
}

/** Read-only image lookups. */
export class ImageService {
  constructor(private readonly backend: ComputeBackend) {}

  async get(imageId: string): Promise<ImageRecord> {
    const image = await this.backend.getImage(imageId);
    if (!image) throw new ImageNotFoundError(imageId);
    logger.debug("Image fetched", { imageId });
    return image;
  }

  async list(limit: number, offset: number): Promise<Page<ImageRecord>> {
    const page = await this.backend.listImages(limit, offset);
    logger.debug("Images listed", { limit, offset, total: page.total });
    return page;
  }
}
