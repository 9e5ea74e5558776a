import { createStore } from 'zustand/vanilla';
import type { Transfer } from '../services/download/types';

export interface TransferTableState {
  /** Latest snapshot of every transfer started this session, keyed by transfer id */
  transfers: Record<string, Transfer>;
  /** Transfer ids in start order, newest last */
  order: string[];

  upsert: (transfer: Transfer) => void;
  remove: (transferId: string) => void;
  clearFinished: () => void;
}

export type TransferStore = ReturnType<typeof createTransferStore>;

export function createTransferStore() {
  return createStore<TransferTableState>()((set) => ({
    transfers: {},
    order: [],

    upsert: (transfer) => set((state) => ({
      transfers: { ...state.transfers, [transfer.id]: transfer },
      order: transfer.id in state.transfers ? state.order : [...state.order, transfer.id],
    })),

    remove: (transferId) => set((state) => {
      const transfers = { ...state.transfers };
      delete transfers[transferId];
      return { transfers, order: state.order.filter((id) => id !== transferId) };
    }),

    clearFinished: () => set((state) => {
      const transfers: Record<string, Transfer> = {};
      for (const id of state.order) {
        const t = state.transfers[id];
        if (t.state === 'pending' || t.state === 'running') transfers[id] = t;
      }
      return { transfers, order: state.order.filter((id) => id in transfers) };
    }),
  }));
}
