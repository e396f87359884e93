import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const SCHEMA_SOURCE = fileURLToPath(
  new URL("../schemas/ContextLattice.schema.json", import.meta.url),
);

/** A throwaway repository tree under the OS temp dir. */
export class RepoFixture {
  readonly root: string;

  constructor() {
    this.root = mkdtempSync(join(tmpdir(), "evidence-gate-repo-"));
  }

  write(rel: string, content: string): string {
    const path = join(this.root, rel);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
    return path;
  }

  writeJson(rel: string, value: unknown): string {
    return this.write(rel, JSON.stringify(value, null, 2));
  }

  /** Copy the repository's lattice schema into the fixture. */
  withLatticeSchema(): this {
    this.write("schemas/ContextLattice.schema.json", readFileSync(SCHEMA_SOURCE, "utf8"));
    return this;
  }

  cleanup(): void {
    rmSync(this.root, { recursive: true, force: true });
  }
}
