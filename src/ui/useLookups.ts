import { useEffect, useState } from 'react';
import * as api from '../api/client';
import type { Vault } from '../domain/types';
import { errorMessage } from './errors';

export interface Lookups {
  vaults: Vault[];
  categories: string[];
  units: string[];
}

const EMPTY: Lookups = { vaults: [], categories: [], units: [] };

/**
 * The user's vaults plus the category and unit lists, reloaded whenever
 * `refreshKey` changes. `reload` refetches after a write.
 */
export function useLookups(refreshKey: number) {
  const [lookups, setLookups] = useState<Lookups>(EMPTY);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);
  const [generation, setGeneration] = useState(0);

  useEffect(() => {
    let mounted = true;
    setLoading(true);

    Promise.all([api.getVaults(), api.getCategories(), api.getUnits()])
      .then(([vaults, categories, units]) => {
        if (!mounted) return;
        setLookups({ vaults, categories, units });
        setError(null);
      })
      .catch((err: unknown) => {
        console.error('[API] Failed to load lookups', err);
        if (mounted) setError(errorMessage(err));
      })
      .finally(() => {
        if (mounted) setLoading(false);
      });

    return () => {
      mounted = false;
    };
  }, [refreshKey, generation]);

  return { ...lookups, loading, error, reload: () => setGeneration((g) => g + 1) };
}
