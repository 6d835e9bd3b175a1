import React, { useCallback, useEffect, useState } from 'react';
import { AlertTriangle, Loader2, RefreshCw, Trash2 } from 'lucide-react';
import { Link, Route, Routes, useMatch, useNavigate } from 'react-router-dom';
import { Button } from './components/ui/button';
import { Select } from './components/ui/select';
import { Card, CardContent, CardHeader, CardTitle } from './components/ui/card';
import { OverviewPage } from './components/OverviewPage';
import { SongDetailPage } from './components/SongDetailPage';
import { fetchSongTable, fetchSourceIdentity } from './lib/api';
import { clearCachedTable, loadCachedTable, saveCachedTable } from './lib/cache';
import { createDashboardContext, OVERVIEW_LABEL, type DashboardContext } from './lib/context';
import { DatasetError, errorMessage } from './lib/errors';
import type { LoadedSongTable } from './lib/types';

type Status = 'loading' | 'ready' | 'error';

export function songPath(label: string): string {
  return `/songs/${encodeURIComponent(label)}`;
}

async function loadFreshTable(refresh: boolean): Promise<LoadedSongTable> {
  const loaded = await fetchSongTable({ refresh });
  await saveCachedTable(loaded);
  return loaded;
}

async function loadTable(): Promise<LoadedSongTable> {
  const identity = await fetchSourceIdentity();
  const cached = await loadCachedTable(identity.hash);
  return cached ?? loadFreshTable(false);
}

const SongSelector: React.FC<{ context: DashboardContext }> = ({ context }) => {
  const navigate = useNavigate();
  const selected = useMatch('/songs/*')?.params['*'] ?? OVERVIEW_LABEL;

  const handleChange = (event: React.ChangeEvent<HTMLSelectElement>) => {
    const { value } = event.target;
    navigate(value === OVERVIEW_LABEL ? '/' : songPath(value), { replace: true });
  };

  return (
    <label className="flex flex-col gap-1 text-sm font-medium sm:w-96">
      Select a song
      <Select id="song-selector" value={selected} onChange={handleChange}>
        {context.selection.map((entry) => (
          <option key={entry.label} value={entry.label}>
            {entry.kind === 'song' && entry.hasAnnotation ? `★ ${entry.label}` : entry.label}
          </option>
        ))}
      </Select>
    </label>
  );
};

const App: React.FC = () => {
  const [status, setStatus] = useState<Status>('loading');
  const [error, setError] = useState<string | null>(null);
  const [context, setContext] = useState<DashboardContext | null>(null);

  const applyLoaded = useCallback((loaded: LoadedSongTable) => {
    setContext(createDashboardContext(loaded));
    setError(null);
    setStatus('ready');
  }, []);

  const applyFailure = useCallback((err: unknown) => {
    console.error(err);
    setContext(null);
    setError(err instanceof DatasetError ? err.message : `Unable to load the dataset: ${errorMessage(err)}`);
    setStatus('error');
  }, []);

  useEffect(() => {
    let cancelled = false;
    async function hydrate() {
      setStatus('loading');
      try {
        const loaded = await loadTable();
        if (!cancelled) applyLoaded(loaded);
      } catch (err) {
        if (!cancelled) applyFailure(err);
      }
    }
    void hydrate();
    return () => {
      cancelled = true;
    };
  }, [applyLoaded, applyFailure]);

  const handleReload = useCallback(async () => {
    setStatus('loading');
    try {
      await clearCachedTable();
      applyLoaded(await loadFreshTable(true));
    } catch (err) {
      applyFailure(err);
    }
  }, [applyLoaded, applyFailure]);

  const handleClear = useCallback(async () => {
    try {
      await clearCachedTable();
    } catch (err) {
      console.error(err);
      setError(`Unable to clear the cached dataset: ${errorMessage(err)}`);
    }
  }, []);

  const datasetInfo = context
    ? `${context.source.name} · ${context.table.records.length.toLocaleString()} songs · sha256 ${context.source.hash.slice(0, 12)}`
    : 'No dataset loaded';

  return (
    <div className="min-h-screen bg-muted/30">
      <header className="border-b bg-background">
        <div className="mx-auto flex max-w-6xl flex-col gap-4 px-6 py-6 lg:flex-row lg:items-end lg:justify-between">
          <div>
            <h1 className="text-2xl font-semibold">
              <Link to="/" replace className="hover:text-primary">
                Lyrics &amp; Audio Analysis Dashboard
              </Link>
            </h1>
            <p className="text-sm text-muted-foreground">{datasetInfo}</p>
          </div>
          <div className="flex flex-col gap-3 sm:flex-row sm:items-end">
            {context ? <SongSelector context={context} /> : null}
            <div className="flex gap-2">
              <Button onClick={handleReload} disabled={status === 'loading'}>
                {status === 'loading' ? <Loader2 className="h-4 w-4 animate-spin" /> : <RefreshCw className="h-4 w-4" />}
                Reload data
              </Button>
              <Button variant="outline" onClick={handleClear} disabled={status === 'loading'}>
                <Trash2 className="h-4 w-4" /> Clear cache
              </Button>
            </div>
          </div>
        </div>
      </header>

      <main className="mx-auto flex max-w-6xl flex-col gap-6 px-6 py-8">
        {status === 'error' ? (
          <Card>
            <CardHeader>
              <CardTitle className="flex items-center gap-2 text-destructive">
                <AlertTriangle className="h-5 w-5" /> Dataset could not be loaded
              </CardTitle>
            </CardHeader>
            <CardContent>
              <p className="text-sm">{error}</p>
              <p className="mt-2 text-sm text-muted-foreground">
                Check the SONG_DASHBOARD_DATA path and the dev server log, then use “Reload data”.
              </p>
            </CardContent>
          </Card>
        ) : context === null ? (
          <p className="flex items-center gap-2 text-sm text-muted-foreground">
            <Loader2 className="h-4 w-4 animate-spin" /> Loading dataset…
          </p>
        ) : (
          <>
            {error ? <p className="text-sm text-destructive">{error}</p> : null}
            <Routes>
              <Route path="/" element={<OverviewPage context={context} />} />
              <Route path="/songs/*" element={<SongDetailPage context={context} />} />
              <Route
                path="*"
                element={
                  <Card>
                    <CardHeader>
                      <CardTitle>Not Found</CardTitle>
                    </CardHeader>
                    <CardContent>
                      <p className="text-sm text-muted-foreground">
                        We couldn’t find that page. Return to the{' '}
                        <Link to="/" replace className="text-primary underline">
                          overview
                        </Link>
                        .
                      </p>
                    </CardContent>
                  </Card>
                }
              />
            </Routes>
          </>
        )}
      </main>
    </div>
  );
};

export default App;
