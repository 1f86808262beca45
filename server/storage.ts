// NOTE: datasets live only in process memory and are lost on restart.
// A persistent implementation only needs to satisfy IStorage.
import type { ActiveDataset } from '@shared/schema';
import { log } from './logger';

export interface IStorage {
  // At most one active dataset per session; set replaces it wholesale
  getActiveDataset(sessionId: string): Promise<ActiveDataset | null>;
  setActiveDataset(sessionId: string, dataset: ActiveDataset): Promise<ActiveDataset>;
  clearActiveDataset(sessionId: string): Promise<boolean>;
  countSessions(): Promise<number>;
}

export class MemStorage implements IStorage {
  private datasets: Map<string, ActiveDataset>;

  constructor() {
    this.datasets = new Map();
  }

  async getActiveDataset(sessionId: string): Promise<ActiveDataset | null> {
    return this.datasets.get(sessionId) ?? null;
  }

  async setActiveDataset(sessionId: string, dataset: ActiveDataset): Promise<ActiveDataset> {
    this.datasets.set(sessionId, dataset);
    log(
      `Сессия ${sessionId.slice(0, 8)}: загружен «${dataset.name}» (${dataset.table.rows.length} строк)`,
      'storage',
    );
    return dataset;
  }

  async clearActiveDataset(sessionId: string): Promise<boolean> {
    return this.datasets.delete(sessionId);
  }

  async countSessions(): Promise<number> {
    return this.datasets.size;
  }
}

export const storage = new MemStorage();
