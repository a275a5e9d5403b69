import admin from 'firebase-admin';
import { getFirestore } from '../firebase.js';
import type { SavedSearch, SearchCriteria } from '../types.js';

const MAX_SAVED_SEARCHES = 50;

function savedSearches(username: string) {
  return getFirestore().collection('users').doc(username).collection('saved_searches');
}

function toIso(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (value instanceof admin.firestore.Timestamp) return value.toDate().toISOString();
  return undefined;
}

function num(value: unknown, fallback = 0): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function str(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function toSavedSearch(id: string, data: admin.firestore.DocumentData): SavedSearch {
  const termYears = data.termYears;
  return {
    id,
    city: str(data.city),
    state: str(data.state),
    downPayment: num(data.downPayment),
    interestRate: num(data.interestRate),
    minPrice: num(data.minPrice),
    maxPrice: num(data.maxPrice),
    ...(typeof termYears === 'number' ? { termYears } : {}),
    createdAt: toIso(data.createdAt)
  };
}

export async function saveSearch(username: string, criteria: SearchCriteria): Promise<{ id: string }> {
  const ref = await savedSearches(username).add({
    city: criteria.city,
    state: criteria.state,
    downPayment: criteria.downPayment,
    interestRate: criteria.interestRate,
    minPrice: criteria.minPrice,
    maxPrice: criteria.maxPrice,
    ...(criteria.termYears !== undefined ? { termYears: criteria.termYears } : {}),
    createdAt: admin.firestore.Timestamp.now()
  });
  return { id: ref.id };
}

export async function listSavedSearches(username: string, limit = MAX_SAVED_SEARCHES): Promise<SavedSearch[]> {
  const snap = await savedSearches(username).orderBy('createdAt', 'desc').limit(limit).get();
  return snap.docs.map((d) => toSavedSearch(d.id, d.data()));
}

/** Resolves to false when the search did not exist. */
export async function deleteSavedSearch(username: string, searchId: string): Promise<boolean> {
  const ref = savedSearches(username).doc(searchId);
  const snap = await ref.get();
  if (!snap.exists) return false;
  await ref.delete();
  return true;
}
