import React from 'react';
import { HoldingsSummaryStats, HoldingsTableRow } from '../../services/HoldingsSummary';
import { formatPercent, formatQuantity, formatWholeUsd } from '../../utils/format';

interface HoldingsTableProps {
  rows: HoldingsTableRow[];
  stats: HoldingsSummaryStats;
}

export const HoldingsTable: React.FC<HoldingsTableProps> = ({ rows, stats }) => {
  return (
    <div className="holdings-table">
      <div className="holdings-summary">
        <div className="summary-item">
          <span className="summary-label">Assets</span>
          <span className="summary-value">{stats.assetCount}</span>
        </div>
        <div className="summary-item">
          <span className="summary-label">Total Value</span>
          <span className="summary-value">{formatWholeUsd(stats.totalValue)}</span>
        </div>
        <div className="summary-item">
          <span className="summary-label">Avg. Holders</span>
          <span className="summary-value">{stats.averageHolders.toFixed(1)}</span>
        </div>
      </div>

      {rows.length === 0 ? (
        <p className="holdings-empty">No assets selected.</p>
      ) : (
        <table>
          <thead>
            <tr>
              <th>Symbol</th>
              <th>Name</th>
              <th>Total Value</th>
              <th>Total Quantity</th>
              <th>Market Share</th>
              <th>Held By</th>
            </tr>
          </thead>
          <tbody>
            {rows.map(row => (
              <tr key={row.symbol}>
                <td>{row.symbol}</td>
                <td>{row.name}</td>
                <td>{formatWholeUsd(row.totalValue)}</td>
                <td>{formatQuantity(row.totalQuantity)}</td>
                <td>{formatPercent(row.marketShare, 2)}</td>
                <td>{row.holders.join(', ')}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </div>
  );
};
