"use client";

import { useState } from "react";
import styles from "./page.module.css";
import { fetchComps } from "../lib/api";
import { averageRent, formatCurrency, formatNumber } from "../lib/dscr";
import type { CompsResponse, PropertyResult } from "../lib/types";

type Props = {
  property: PropertyResult;
};

export default function CompsPanel({ property }: Props) {
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [report, setReport] = useState<CompsResponse | null>(null);

  async function loadComps() {
    setLoading(true);
    setError(null);

    try {
      const response = await fetchComps({
        address: property.address,
        city: property.city ?? "",
        state: property.state ?? "",
        zipcode: property.zipcode,
        price: property.rent,
        bedrooms: property.bedrooms,
        bathrooms: property.bathrooms ?? 0,
        squareFeet: property.livingArea,
        latitude: property.latitude,
        longitude: property.longitude
      });
      setReport(response);
    } catch (err) {
      setError(err instanceof Error ? err.message : "Failed to fetch rental comps.");
    } finally {
      setLoading(false);
    }
  }

  const average = report ? averageRent(report.comps.map((c) => c.rent)) : undefined;

  return (
    <div className={styles.comps}>
      <button className={styles.secondaryButton} type="button" onClick={loadComps} disabled={loading}>
        {loading ? "Loading Comps…" : "Get Long Term Comps"}
      </button>

      {error ? <div className={styles.error}>{error}</div> : null}

      {report && report.comps.length === 0 ? (
        <div className={styles.emptyState} role="status">
          <p>No rental comps found</p>
          {report.diagnostics.reasons.length ? (
            <ul className={styles.reasons}>
              {report.diagnostics.reasons.map((reason) => (
                <li key={reason}>{reason}</li>
              ))}
            </ul>
          ) : null}
        </div>
      ) : null}

      {report && report.comps.length > 0 ? (
        <>
          <h3 className={styles.compsTitle}>Rental Comps</h3>
          <table className={styles.compsTable}>
            <thead>
              <tr>
                <th>Address</th>
                <th>Rent</th>
                <th>Beds/Baths</th>
                <th>Sq. Feet</th>
                <th>Distance</th>
                <th>Match</th>
              </tr>
            </thead>
            <tbody>
              {report.comps.map((comp) => (
                <tr key={comp.address}>
                  <td>{comp.address}</td>
                  <td>{formatCurrency(comp.rent)}</td>
                  <td>
                    {comp.bedrooms}/{comp.bathrooms}
                  </td>
                  <td>{comp.squareFeet > 0 ? formatNumber(comp.squareFeet) : "—"}</td>
                  <td>{comp.distanceMiles !== undefined ? `${comp.distanceMiles.toFixed(1)} mi` : "—"}</td>
                  <td>{comp.similarityScore}%</td>
                </tr>
              ))}
            </tbody>
          </table>
          {average !== undefined ? (
            <p className={styles.averageRent}>Average rent: {formatCurrency(average, 2)}</p>
          ) : null}
        </>
      ) : null}
    </div>
  );
}
