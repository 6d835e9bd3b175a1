import React from 'react';
import {
  Bar,
  BarChart,
  CartesianGrid,
  Cell,
  Legend,
  Pie,
  PieChart,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis
} from 'recharts';
import type { BarChartDescriptor, HistogramDescriptor, PieChartDescriptor } from '../lib/charts';
import type { ChartSlot } from '../lib/overview';
import { Card, CardContent, CardHeader, CardTitle } from './ui/card';

const chartColors = ['#3D5A80', '#98C1D9', '#EE6C4D', '#293241', '#E0FBFC', '#F4A259', '#5B8E7D', '#BC4B51', '#8CB369', '#6D597A'];

export function formatPercent(value: number, decimals = 1): string {
  if (!Number.isFinite(value)) return '0%';
  return `${value.toFixed(decimals)}%`;
}

function formatBinEdge(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

const BarView: React.FC<{ chart: BarChartDescriptor }> = ({ chart }) => (
  <ResponsiveContainer width="100%" height={280}>
    <BarChart data={[...chart.entries]} margin={{ top: 8, right: 8, bottom: 48, left: 0 }}>
      <CartesianGrid strokeDasharray="3 3" vertical={false} />
      <XAxis dataKey="category" interval={0} angle={-30} textAnchor="end" tick={{ fontSize: 11 }} />
      <YAxis allowDecimals={false} />
      <Tooltip formatter={(value) => [`${value} songs`, 'Count']} />
      <Bar dataKey="count" radius={[4, 4, 0, 0]}>
        {chart.entries.map((entry, index) => (
          <Cell key={entry.category} fill={chartColors[index % chartColors.length]} />
        ))}
      </Bar>
    </BarChart>
  </ResponsiveContainer>
);

const PieView: React.FC<{ chart: PieChartDescriptor }> = ({ chart }) => (
  <ResponsiveContainer width="100%" height={280}>
    <PieChart>
      <Pie
        data={[...chart.slices]}
        dataKey="count"
        nameKey="category"
        innerRadius={50}
        outerRadius={90}
        paddingAngle={2}
        label={(slice: { percent?: number }) => formatPercent((slice.percent ?? 0) * 100)}
      >
        {chart.slices.map((slice, index) => (
          <Cell key={slice.category} fill={chartColors[index % chartColors.length]} />
        ))}
      </Pie>
      <Legend verticalAlign="bottom" iconType="circle" />
      <Tooltip formatter={(value, name) => [`${value} songs`, String(name)]} />
    </PieChart>
  </ResponsiveContainer>
);

const HistogramView: React.FC<{ chart: HistogramDescriptor }> = ({ chart }) => {
  const data = chart.bins.map((bin) => ({
    range: `${formatBinEdge(bin.start)}–${formatBinEdge(bin.end)}`,
    count: bin.count
  }));
  return (
    <ResponsiveContainer width="100%" height={280}>
      <BarChart data={data} barCategoryGap={1} margin={{ top: 8, right: 8, bottom: 24, left: 0 }}>
        <CartesianGrid strokeDasharray="3 3" vertical={false} />
        <XAxis dataKey="range" tick={{ fontSize: 11 }} />
        <YAxis allowDecimals={false} />
        <Tooltip formatter={(value) => [`${value} songs`, 'Count']} />
        <Bar dataKey="count" fill="#3D5A80" />
      </BarChart>
    </ResponsiveContainer>
  );
};

export const ChartPanel: React.FC<{ slot: ChartSlot }> = ({ slot }) => {
  const { chart } = slot;
  return (
    <Card>
      <CardHeader>
        <CardTitle>{slot.title}</CardTitle>
      </CardHeader>
      <CardContent>
        {chart === null ? (
          <p className="text-sm text-muted-foreground">{slot.placeholder}</p>
        ) : chart.kind === 'bar' ? (
          <BarView chart={chart} />
        ) : chart.kind === 'pie' ? (
          <PieView chart={chart} />
        ) : (
          <HistogramView chart={chart} />
        )}
      </CardContent>
    </Card>
  );
};
