import type { StateStore } from './store.js'

export interface Cursor {
  lastPage: number | null      // null: never run, start from the thread's latest page
  lastSentId: number | null    // null: nothing delivered yet, next run is a baseline run
}

export interface Checkpoint {
  lastPage: number
  lastSentId: number
}

export async function loadCursor(store: StateStore): Promise<Cursor> {
  return {
    lastPage: await store.get('last_page'),
    lastSentId: await store.get('last_sent_id'),
  }
}

export async function saveCursor(store: StateStore, checkpoint: Checkpoint): Promise<void> {
  await store.set('last_page', checkpoint.lastPage)
  await store.set('last_sent_id', checkpoint.lastSentId)
}
