import React, { useMemo } from 'react';
import { Sparkles } from 'lucide-react';
import type { DashboardContext } from '../lib/context';
import { buildOverview } from '../lib/overview';
import { ChartPanel } from './ChartPanel';
import { Badge } from './ui/badge';
import { Card, CardContent, CardHeader, CardTitle } from './ui/card';

export const OverviewPage: React.FC<{ context: DashboardContext }> = ({ context }) => {
  const overview = useMemo(() => buildOverview(context), [context]);
  const { counters, annotations } = overview;

  return (
    <div className="flex flex-col gap-8">
      <div className="flex flex-wrap gap-2" id="overview-counters">
        <Badge variant="secondary">Total songs: {counters.total.toLocaleString()}</Badge>
        <Badge variant="secondary">With lyrics: {counters.withLyrics.toLocaleString()}</Badge>
        <Badge variant="annotated">
          <Sparkles className="h-3 w-3" /> AI analysed: {counters.annotated.toLocaleString()}
        </Badge>
      </div>

      <section className="flex flex-col gap-4">
        <h2 className="text-xl font-semibold">Overall analysis</h2>
        {annotations.status === 'available' ? (
          <div className="grid gap-4 md:grid-cols-2">
            <ChartPanel slot={annotations.sentiment} />
            <ChartPanel slot={annotations.themes} />
          </div>
        ) : (
          <Card>
            <CardHeader>
              <CardTitle>AI analysis unavailable</CardTitle>
            </CardHeader>
            <CardContent>
              <p className="text-sm text-muted-foreground">{annotations.reason}</p>
            </CardContent>
          </Card>
        )}
      </section>

      <section className="flex flex-col gap-4">
        <div>
          <h2 className="text-xl font-semibold">Audio dimensions</h2>
          <p className="text-sm text-muted-foreground">Only songs with a value for a dimension are counted in its chart.</p>
        </div>
        {overview.moods.length > 0 ? (
          <>
            <h3 className="text-lg font-medium">Mood dimensions: high / low share</h3>
            <div className="grid gap-4 md:grid-cols-2 xl:grid-cols-3">
              {overview.moods.map((slot) => (
                <ChartPanel key={slot.id} slot={slot} />
              ))}
            </div>
          </>
        ) : null}

        <h3 className="text-lg font-medium">Key, scale and timbre</h3>
        <div className="grid gap-4 md:grid-cols-2 xl:grid-cols-3">
          {overview.keyAndTimbre.map((slot) => (
            <ChartPanel key={slot.id} slot={slot} />
          ))}
        </div>

        <h3 className="text-lg font-medium">Other numerical dimensions</h3>
        <div className="grid gap-4 md:grid-cols-2">
          {overview.numeric.map((slot) => (
            <ChartPanel key={slot.id} slot={slot} />
          ))}
        </div>
      </section>
    </div>
  );
};
