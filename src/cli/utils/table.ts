// CLI table printer utility

export type Align = "left" | "right";

export class TablePrinter {
  private headers: string[] = [];
  private aligns: Align[] = [];
  private rows: string[][] = [];
  private widths: number[] = [];

  header(...cols: string[]): this {
    this.headers = cols;
    this.widths = cols.map((c) => c.length);
    return this;
  }

  /** Column alignment; columns without an entry are left-aligned */
  align(...aligns: Align[]): this {
    this.aligns = aligns;
    return this;
  }

  row(...cols: (string | number)[]): this {
    const cells = cols.map(String);
    this.rows.push(cells);
    cells.forEach((c, i) => {
      this.widths[i] = Math.max(this.widths[i] || 0, c.length);
    });
    return this;
  }

  render(): string[] {
    if (this.headers.length === 0) return [];

    const pad = (c: string, i: number) =>
      this.aligns[i] === "right" ? c.padStart(this.widths[i]) : c.padEnd(this.widths[i]);
    const formatRow = (cols: string[]) => cols.map(pad).join("  ").trimEnd();

    return [
      formatRow(this.headers),
      this.widths.map((w) => "-".repeat(w)).join("  "),
      ...this.rows.map(formatRow),
    ];
  }

  flush(): void {
    this.render().forEach((line) => console.log(line));
  }
}
