/**
 * Detection Cache
 *
 * In-memory memoization of rendered pages, preprocessed pages and input
 * region features, keyed by file path, modification time and purpose, plus a
 * single slot for a loaded template database. No eviction: entries live as
 * long as the cache instance.
 */

import { createHash } from 'crypto';
import fs from 'fs';
import type { GrayImage } from '../imaging/raster';
import type { TemplateDatabase } from '../types';
import type { RegionFeatureSet } from './visual/regions';

export type ImagePurpose = 'render' | 'preprocessed';
export type CachePurpose = ImagePurpose | 'regions';

export interface CacheStats {
  images: number;
  regions: number;
  hasTemplateDatabase: boolean;
}

export class DetectionCache {
  private readonly images = new Map<string, GrayImage>();
  private readonly regions = new Map<string, RegionFeatureSet>();
  private templateDatabase: TemplateDatabase | null = null;

  /**
   * Key from path + mtime + purpose. When the file cannot be stat'ed the key
   * falls back to path + purpose.
   */
  async cacheKey(pdfPath: string, purpose: CachePurpose): Promise<string> {
    let keyData: string;
    try {
      const stat = await fs.promises.stat(pdfPath);
      keyData = `${pdfPath}_${stat.mtimeMs}_${purpose}`;
    } catch {
      keyData = `${pdfPath}_${purpose}`;
    }
    return createHash('md5').update(keyData).digest('hex');
  }

  async getImage(pdfPath: string, purpose: ImagePurpose): Promise<GrayImage | undefined> {
    return this.images.get(await this.cacheKey(pdfPath, purpose));
  }

  async setImage(pdfPath: string, purpose: ImagePurpose, image: GrayImage): Promise<void> {
    this.images.set(await this.cacheKey(pdfPath, purpose), image);
  }

  async getRegions(pdfPath: string): Promise<RegionFeatureSet | undefined> {
    return this.regions.get(await this.cacheKey(pdfPath, 'regions'));
  }

  async setRegions(pdfPath: string, regions: RegionFeatureSet): Promise<void> {
    this.regions.set(await this.cacheKey(pdfPath, 'regions'), regions);
  }

  /** The database slot ignores which directory the database came from. */
  getTemplateDatabase(): TemplateDatabase | null {
    return this.templateDatabase;
  }

  setTemplateDatabase(database: TemplateDatabase): void {
    this.templateDatabase = database;
  }

  clearTemplateDatabase(): void {
    this.templateDatabase = null;
  }

  clear(): void {
    this.images.clear();
    this.regions.clear();
    this.templateDatabase = null;
  }

  stats(): CacheStats {
    return {
      images: this.images.size,
      regions: this.regions.size,
      hasTemplateDatabase: this.templateDatabase !== null,
    };
  }
}
