import React, { useMemo } from 'react';
import { AlertTriangle, Music2 } from 'lucide-react';
import { Link, useParams } from 'react-router-dom';
import type { DashboardContext } from '../lib/context';
import { buildSongDetail, type SongDetail } from '../lib/detail';
import { StaleSelectionError } from '../lib/errors';
import { Badge } from './ui/badge';
import { Button } from './ui/button';
import { Card, CardContent, CardHeader, CardTitle } from './ui/card';

type DetailState = { ok: true; detail: SongDetail } | { ok: false; error: StaleSelectionError };

function formatFieldValue(value: string | number): string {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : value.toFixed(3);
  }
  return value;
}

export const SongDetailPage: React.FC<{ context: DashboardContext }> = ({ context }) => {
  const label = useParams()['*'] ?? '';

  const state = useMemo<DetailState>(() => {
    try {
      return { ok: true, detail: buildSongDetail(context, label) };
    } catch (error) {
      if (error instanceof StaleSelectionError) {
        return { ok: false, error };
      }
      throw error;
    }
  }, [context, label]);

  if (!state.ok) {
    return (
      <Card>
        <CardHeader>
          <CardTitle>Song not found</CardTitle>
        </CardHeader>
        <CardContent className="flex flex-col items-start gap-4">
          <p className="text-sm text-muted-foreground">{state.error.message}</p>
          <Button asChild variant="outline">
            <Link to="/" replace>
              Back to the overview
            </Link>
          </Button>
        </CardContent>
      </Card>
    );
  }

  const { detail } = state;

  return (
    <div className="flex flex-col gap-6">
      <div>
        <h2 className="flex items-center gap-2 text-2xl font-semibold">
          <Music2 className="h-6 w-6" /> {detail.title}
        </h2>
        <p className="text-muted-foreground">
          Album: <em>{detail.album}</em>
        </p>
        {detail.matchCount > 1 ? (
          <Badge variant="warning" className="mt-2">
            <AlertTriangle className="h-3 w-3" />
            {detail.matchCount} songs share this name and album; showing the first one in the dataset.
          </Badge>
        ) : null}
      </div>

      <div className="grid gap-6 lg:grid-cols-3">
        <div className="flex flex-col gap-6 lg:col-span-2">
          <Card>
            <CardHeader>
              <CardTitle>Lyrics</CardTitle>
            </CardHeader>
            <CardContent>
              {detail.lyrics === null ? (
                <p className="text-sm text-muted-foreground">No lyrics for this song.</p>
              ) : (
                <pre className="max-h-96 overflow-y-auto whitespace-pre-wrap font-sans text-sm">{detail.lyrics}</pre>
              )}
            </CardContent>
          </Card>

          <Card>
            <CardHeader>
              <CardTitle>AI analysis</CardTitle>
            </CardHeader>
            <CardContent>
              {detail.annotation === null ? (
                <p className="text-sm text-muted-foreground">No AI analysis for this song yet.</p>
              ) : (
                <dl className="grid gap-3 text-sm">
                  <div>
                    <dt className="font-medium">Theme</dt>
                    <dd>{detail.annotation.theme}</dd>
                  </div>
                  <div>
                    <dt className="font-medium">Sentiment category</dt>
                    <dd>
                      {detail.annotation.sentimentCategory}{' '}
                      <span className="text-muted-foreground">(raw sentiment: {detail.annotation.sentiment})</span>
                    </dd>
                  </div>
                  <div>
                    <dt className="font-medium">Notes</dt>
                    <dd className="whitespace-pre-wrap">{detail.annotation.notes}</dd>
                  </div>
                </dl>
              )}
            </CardContent>
          </Card>

          <Card>
            <CardHeader>
              <CardTitle>Credits</CardTitle>
            </CardHeader>
            <CardContent>
              <dl className="grid grid-cols-2 gap-3 text-sm">
                {detail.credits.map((credit) => (
                  <div key={credit.role}>
                    <dt className="font-medium">{credit.label}</dt>
                    <dd>{credit.value}</dd>
                  </div>
                ))}
              </dl>
            </CardContent>
          </Card>
        </div>

        <Card>
          <CardHeader>
            <CardTitle>All data fields</CardTitle>
          </CardHeader>
          <CardContent>
            {detail.otherFields.length === 0 ? (
              <p className="text-sm text-muted-foreground">No other audio or metadata fields for this song.</p>
            ) : (
              <table className="w-full text-sm" id="song-fields-table">
                <tbody>
                  {detail.otherFields.map((item) => (
                    <tr key={item.field} className="border-b last:border-0">
                      <th className="py-1 pr-3 text-left font-medium">{item.field}</th>
                      <td className="py-1 text-right tabular-nums">{formatFieldValue(item.value)}</td>
                    </tr>
                  ))}
                </tbody>
              </table>
            )}
          </CardContent>
        </Card>
      </div>
    </div>
  );
};
