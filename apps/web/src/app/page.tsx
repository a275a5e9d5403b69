"use client";

import { useMemo, useState, type FormEvent } from "react";
import styles from "./page.module.css";
import CompsPanel from "./CompsPanel";
import { runSearch } from "../lib/api";
import { formatCurrency, formatNumber, gradeDscr } from "../lib/dscr";
import stateCodes from "../lib/states.json";
import type { PropertyResult } from "../lib/types";

const PAGE_SIZE = 10;

const US_STATE_CODES = new Set<string>(stateCodes);

const SORTS = {
  dscr_desc: "DSCR (High → Low)",
  price_asc: "Price (Low → High)",
  price_desc: "Price (High → Low)",
  rent_desc: "Rent (High → Low)"
} as const;

type SortKey = keyof typeof SORTS;

function isSortKey(value: string): value is SortKey {
  return value in SORTS;
}

function splitAddressLines(address: string): { line1: string; line2: string | null } {
  const value = address.trim();
  if (!value) return { line1: "Data not available", line2: null };

  const parts = value.split(",").map((p) => p.trim()).filter(Boolean);
  if (parts.length <= 1) return { line1: value, line2: null };

  return { line1: parts[0], line2: parts.slice(1).join(", ") };
}

function sortResults(results: PropertyResult[], sort: SortKey): PropertyResult[] {
  // The API already returns best DSCR first.
  if (sort === "dscr_desc") return results;

  const sorted = [...results];
  if (sort === "price_asc") sorted.sort((a, b) => a.price - b.price);
  if (sort === "price_desc") sorted.sort((a, b) => b.price - a.price);
  if (sort === "rent_desc") sorted.sort((a, b) => b.rent - a.rent);
  return sorted;
}

function parseAmount(value: string): number {
  return Number(value.replace(/[$,\s]/g, ""));
}

export default function Home() {
  const [city, setCity] = useState("");
  const [state, setState] = useState("");
  const [downPayment, setDownPayment] = useState("20");
  const [interestRate, setInterestRate] = useState("7");
  const [minPrice, setMinPrice] = useState("150000");
  const [maxPrice, setMaxPrice] = useState("1500000");

  const [sort, setSort] = useState<SortKey>("dscr_desc");
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [results, setResults] = useState<PropertyResult[]>([]);
  const [hasSearched, setHasSearched] = useState(false);
  const [lastQueryLabel, setLastQueryLabel] = useState<string | null>(null);
  const [page, setPage] = useState(1);

  const totalPages = Math.max(1, Math.ceil(results.length / PAGE_SIZE));

  const pagedResults = useMemo(() => {
    const start = (page - 1) * PAGE_SIZE;
    return sortResults(results, sort).slice(start, start + PAGE_SIZE);
  }, [page, results, sort]);

  function clearSearch() {
    setCity("");
    setState("");
    setSort("dscr_desc");
    setError(null);
    setResults([]);
    setPage(1);
    setHasSearched(false);
    setLastQueryLabel(null);
  }

  function validate(): string | null {
    const c = city.trim();
    const s = state.trim().toUpperCase();
    if (c.length < 2) return "Please enter a city.";
    if (!/^[A-Z]{2}$/.test(s) || !US_STATE_CODES.has(s)) {
      return "Please enter a valid 2-letter US state code (e.g., TX).";
    }

    const down = parseAmount(downPayment);
    if (!(down >= 0 && down <= 100)) return "Down payment must be between 0 and 100%.";
    const rate = parseAmount(interestRate);
    if (!(rate >= 0 && rate <= 30)) return "Interest rate must be between 0 and 30%.";

    const min = parseAmount(minPrice || "0");
    const max = parseAmount(maxPrice || "0");
    if (!(min >= 0) || !(max >= 0)) return "Prices must be positive numbers.";
    if (max > 0 && max < min) return "Max price must be at least the min price.";
    return null;
  }

  async function onSubmit(e: FormEvent) {
    e.preventDefault();
    setError(null);

    const validationError = validate();
    if (validationError) {
      setError(validationError);
      return;
    }

    setLoading(true);
    setResults([]);
    setPage(1);
    setHasSearched(false);

    const criteria = {
      city: city.trim(),
      state: state.trim().toUpperCase(),
      downPayment: parseAmount(downPayment),
      interestRate: parseAmount(interestRate),
      minPrice: Math.round(parseAmount(minPrice || "0")),
      maxPrice: Math.round(parseAmount(maxPrice || "0"))
    };
    setLastQueryLabel(`${criteria.city}, ${criteria.state}`);

    try {
      const response = await runSearch(criteria);
      setResults(response.properties);
      setHasSearched(true);
    } catch (err) {
      setError(err instanceof Error ? err.message : "Unknown error");
    } finally {
      setLoading(false);
    }
  }

  return (
    <div className={styles.page}>
      <main className={styles.main}>
        <div className={styles.content}>
          <div className={styles.header}>
            <h1 className={styles.title}>DSCR Property Analyzer</h1>
            <p className={styles.subtitle}>
              Find for-sale homes where the expected rent covers the mortgage.
            </p>
          </div>

          {loading || hasSearched ? (
            <section className={styles.resultsHeaderPanel}>
              {loading ? (
                <div className={styles.resultsHeader} role="status" aria-live="polite">
                  <h2>Searching…</h2>
                </div>
              ) : (
                <div className={styles.resultsHeader}>
                  <h2>Results</h2>
                  <span className={styles.listingCount}>{results.length} propert{results.length === 1 ? "y" : "ies"}</span>
                </div>
              )}
            </section>
          ) : null}

          <section className={styles.sidebar}>
            <form className={styles.form} onSubmit={onSubmit}>
              <fieldset className={styles.fieldset} disabled={loading}>
                <div className={styles.row}>
                  <label className={styles.label}>
                    City
                    <input
                      className={styles.input}
                      value={city}
                      onChange={(e) => setCity(e.target.value)}
                      placeholder='e.g. "Austin"'
                    />
                  </label>
                  <label className={styles.label}>
                    State
                    <input
                      className={styles.input}
                      value={state}
                      onChange={(e) => setState(e.target.value)}
                      placeholder='e.g. "TX"'
                    />
                  </label>
                </div>

                <div className={styles.row}>
                  <label className={styles.label}>
                    Down Payment (%)
                    <input
                      className={styles.input}
                      inputMode="decimal"
                      value={downPayment}
                      onChange={(e) => setDownPayment(e.target.value)}
                    />
                  </label>
                  <label className={styles.label}>
                    Interest Rate (%)
                    <input
                      className={styles.input}
                      inputMode="decimal"
                      value={interestRate}
                      onChange={(e) => setInterestRate(e.target.value)}
                    />
                  </label>
                </div>

                <div className={styles.row}>
                  <label className={styles.label}>
                    Min Price ($)
                    <input
                      className={styles.input}
                      inputMode="numeric"
                      value={minPrice}
                      onChange={(e) => setMinPrice(e.target.value)}
                    />
                  </label>
                  <label className={styles.label}>
                    Max Price ($)
                    <input
                      className={styles.input}
                      inputMode="numeric"
                      value={maxPrice}
                      onChange={(e) => setMaxPrice(e.target.value)}
                    />
                  </label>
                </div>

                <button className={styles.button} type="submit">
                  {loading ? "Searching…" : "Search"}
                </button>

                <button
                  className={`${styles.secondaryButton} ${styles.clearButton}`}
                  type="button"
                  onClick={clearSearch}
                >
                  Clear Search
                </button>
              </fieldset>
            </form>

            {error ? <div className={styles.error}>{error}</div> : null}
          </section>

          <section className={styles.resultsPanel}>
            {!loading && !error && hasSearched && results.length === 0 ? (
              <div className={styles.emptyState} role="status" aria-live="polite">
                No properties with rent data found for {lastQueryLabel || "that city/state"}. Try a wider
                price range.
              </div>
            ) : null}

            {results.length > 1 ? (
              <div className={styles.pagination}>
                {results.length > PAGE_SIZE ? (
                  <div className={styles.paginationLeft}>
                    <button
                      className={styles.secondaryButton}
                      onClick={() => setPage((p) => Math.max(1, p - 1))}
                      disabled={page <= 1}
                      type="button"
                    >
                      Prev
                    </button>
                    <span>
                      Page {page} / {totalPages}
                    </span>
                    <button
                      className={styles.secondaryButton}
                      onClick={() => setPage((p) => Math.min(totalPages, p + 1))}
                      disabled={page >= totalPages}
                      type="button"
                    >
                      Next
                    </button>
                  </div>
                ) : null}

                <div className={styles.sortControl}>
                  <label className={styles.sortLabel} htmlFor="sort">
                    Sort
                  </label>
                  <select
                    id="sort"
                    className={styles.select}
                    value={sort}
                    onChange={(e) => {
                      if (!isSortKey(e.target.value)) return;
                      setSort(e.target.value);
                      setPage(1);
                    }}
                  >
                    {Object.entries(SORTS).map(([key, label]) => (
                      <option key={key} value={key}>
                        {label}
                      </option>
                    ))}
                  </select>
                </div>
              </div>
            ) : null}

            <div className={styles.cards}>
              {pagedResults.map((p) => {
                const addr = splitAddressLines(p.address);
                const { grade, tone } = gradeDscr(p.dscr);
                return (
                  <article key={p.zpid} className={styles.card}>
                    <div className={styles.cardBody}>
                      <div className={styles.cardAddress}>
                        <div className={styles.cardTitle}>{addr.line1}</div>
                        {addr.line2 ? <div className={styles.cardSubTitle}>{addr.line2}</div> : null}
                      </div>

                      <div className={styles.dscr}>
                        <span className={styles.dscrValue}>DSCR {p.dscr.toFixed(2)}</span>
                        <span className={`${styles.grade} ${styles[tone]}`}>{grade}</span>
                      </div>

                      <div className={styles.cardGrid}>
                        <div>Price: {formatCurrency(p.price)}</div>
                        <div>
                          Rent: {formatCurrency(p.rent)} ({p.rentType})
                        </div>
                        <div>Bedrooms: {formatNumber(p.bedrooms)}</div>
                        <div>Bathrooms: {formatNumber(p.bathrooms)}</div>
                        <div>Sq. Feet: {formatNumber(p.livingArea)}</div>
                        <div>Monthly payment: {formatCurrency(p.monthlyPayment, 2)}</div>
                      </div>

                      <dl className={styles.breakdown}>
                        <dt>Principal &amp; interest</dt>
                        <dd>{formatCurrency(p.payment.principalAndInterest, 2)}</dd>
                        <dt>Property tax</dt>
                        <dd>{formatCurrency(p.payment.propertyTax, 2)}</dd>
                        <dt>Insurance</dt>
                        <dd>{formatCurrency(p.payment.insurance, 2)}</dd>
                        {p.payment.hoa > 0 ? (
                          <>
                            <dt>HOA</dt>
                            <dd>{formatCurrency(p.payment.hoa, 2)}</dd>
                          </>
                        ) : null}
                        {p.payment.pmi > 0 ? (
                          <>
                            <dt>PMI</dt>
                            <dd>{formatCurrency(p.payment.pmi, 2)}</dd>
                          </>
                        ) : null}
                      </dl>

                      <a className={styles.link} href={p.zillowUrl} target="_blank" rel="noreferrer">
                        View on Zillow
                      </a>
                    </div>

                    <CompsPanel property={p} />
                  </article>
                );
              })}
            </div>
          </section>
        </div>
      </main>
    </div>
  );
}
