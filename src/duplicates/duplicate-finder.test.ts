import { describe, test, expect, vi } from "vitest";
import pino from "pino";
import { EmbeddingBackendError } from "../lib/errors.ts";
import { createDuplicateFinder } from "./duplicate-finder.ts";
import type { CandidateIssue, EmbeddingClient } from "./types.ts";

const logger = pino({ level: "silent" });

function issue(id: number, title: string, body = ""): CandidateIssue {
  return { id, title, body, url: `https://github.com/acme/widgets/issues/${id}` };
}

function createFakeClient(toVector: (text: string) => number[]): EmbeddingClient {
  return {
    model: "fake-embedding",
    embedBatch: async (texts) => texts.map(toVector),
  };
}

describe("createDuplicateFinder backend selection", () => {
  test("uses lexical when embeddings are disabled", () => {
    const finder = createDuplicateFinder({ useEmbeddings: false }, { logger });
    expect(finder.backend).toBe("lexical");
  });

  test("falls back to lexical without a credential", () => {
    const finder = createDuplicateFinder({ useEmbeddings: true }, { logger });
    expect(finder.backend).toBe("lexical");
  });

  test("treats a blank credential as absent", () => {
    const finder = createDuplicateFinder({ useEmbeddings: true, apiCredential: "  " }, { logger });
    expect(finder.backend).toBe("lexical");
  });

  test("uses embeddings when a credential is configured", () => {
    const finder = createDuplicateFinder(
      { useEmbeddings: true, apiCredential: "test-secret" },
      { logger },
    );
    expect(finder.backend).toBe("embedding");
  });

  test("uses embeddings with an injected client", () => {
    const finder = createDuplicateFinder(
      { useEmbeddings: true },
      { logger, embeddingClient: createFakeClient(() => [1]) },
    );
    expect(finder.backend).toBe("embedding");
  });

  test("applies defaults", () => {
    const finder = createDuplicateFinder({ useEmbeddings: false }, { logger });
    expect(finder.threshold).toBe(0.75);
    expect(finder.topK).toBe(3);
  });

  test("rejects an out-of-range threshold or topK", () => {
    expect(() =>
      createDuplicateFinder({ useEmbeddings: false, similarityThreshold: 1.5 }, { logger }),
    ).toThrow(RangeError);
    expect(() => createDuplicateFinder({ useEmbeddings: false, topK: 0 }, { logger })).toThrow(
      RangeError,
    );
  });
});

describe("findSimilarIssues", () => {
  const target = { id: 1, title: "React component rendering issue", body: "" };
  const reactCandidates = [
    issue(2, "React component rendering problem"),
    issue(3, "Python database connection"),
    issue(4, "React jsx rendering bug"),
  ];

  test("ranks React issues above the unrelated one", async () => {
    const finder = createDuplicateFinder(
      { useEmbeddings: false, similarityThreshold: 0.1 },
      { logger },
    );
    const result = await finder.findSimilarIssues(target, reactCandidates, 2);
    expect(result).toEqual([
      { id: 2, title: "React component rendering problem", url: reactCandidates[0]?.url, similarity: 0.54 },
      { id: 4, title: "React jsx rendering bug", url: reactCandidates[2]?.url, similarity: 0.15 },
    ]);
  });

  test("applies the configured threshold", async () => {
    const finder = createDuplicateFinder(
      { useEmbeddings: false, similarityThreshold: 0.3 },
      { logger },
    );
    const result = await finder.findSimilarIssues(target, reactCandidates, 2);
    expect(result.map((m) => m.id)).toEqual([2]);
  });

  test("returns [] for an empty candidate list without calling the backend", async () => {
    const client = createFakeClient(() => [1]);
    const spy = vi.spyOn(client, "embedBatch");
    const finder = createDuplicateFinder({ useEmbeddings: true }, { logger, embeddingClient: client });

    expect(await finder.findSimilarIssues(target, [])).toEqual([]);
    expect(spy).not.toHaveBeenCalled();
  });

  test("returns [] when the only candidate is the target itself", async () => {
    const client = createFakeClient(() => [1]);
    const spy = vi.spyOn(client, "embedBatch");
    const finder = createDuplicateFinder({ useEmbeddings: true }, { logger, embeddingClient: client });

    expect(await finder.findSimilarIssues(target, [issue(1, target.title)])).toEqual([]);
    expect(spy).not.toHaveBeenCalled();
  });

  test("never returns the target itself", async () => {
    const finder = createDuplicateFinder(
      { useEmbeddings: false, similarityThreshold: 0 },
      { logger },
    );
    const result = await finder.findSimilarIssues(target, [
      issue(1, target.title),
      issue(5, target.title),
    ]);
    expect(result.map((m) => m.id)).toEqual([5]);
    expect(result[0]?.similarity).toBe(1);
  });

  test("results are sorted, above threshold and within topK", async () => {
    const finder = createDuplicateFinder(
      { useEmbeddings: false, similarityThreshold: 0.05 },
      { logger },
    );
    const candidates = [
      issue(10, "Login page crash on submit"),
      issue(11, "Crash on login"),
      issue(12, "Login crash when password empty"),
      issue(13, "Dark mode colors"),
      issue(14, "Login page crash"),
    ];
    const result = await finder.findSimilarIssues(
      { id: 99, title: "Login page crash", body: "The login page crashes on submit" },
      candidates,
      3,
    );
    expect(result.length).toBeLessThanOrEqual(3);
    expect(result.map((m) => m.id)).not.toContain(13);
    for (let i = 1; i < result.length; i++) {
      expect(result[i - 1]?.similarity ?? 0).toBeGreaterThanOrEqual(result[i]?.similarity ?? 0);
    }
    for (const match of result) {
      expect(match.similarity).toBeGreaterThanOrEqual(0.05);
    }
  });

  test("per-call topK overrides the default", async () => {
    const finder = createDuplicateFinder(
      { useEmbeddings: false, similarityThreshold: 0, topK: 1 },
      { logger },
    );
    const candidates = [issue(2, "Crash"), issue(3, "Crash again"), issue(4, "Crash loop")];
    expect(await finder.findSimilarIssues({ id: 1, title: "Crash" }, candidates)).toHaveLength(1);
    expect(await finder.findSimilarIssues({ id: 1, title: "Crash" }, candidates, 2)).toHaveLength(2);
  });

  test("treats missing title and body as empty", async () => {
    const finder = createDuplicateFinder({ useEmbeddings: false }, { logger });
    const result = await finder.findSimilarIssues({ id: 1, title: null, body: null }, [
      { id: 2, title: undefined, url: "u" },
    ]);
    expect(result).toEqual([]);
  });

  test("embedding backend combines title-weighted text and ranks by cosine", async () => {
    const seen: string[] = [];
    const client: EmbeddingClient = {
      model: "fake-embedding",
      embedBatch: async (texts) => {
        seen.push(...texts);
        return texts.map((t) => (t.includes("crash") ? [1, 0] : [0.6, 0.8]));
      },
    };
    const finder = createDuplicateFinder(
      { useEmbeddings: true, similarityThreshold: 0.5 },
      { logger, embeddingClient: client },
    );
    const result = await finder.findSimilarIssues(
      { id: 1, title: "App Crash", body: "on start" },
      [issue(2, "Settings page", "slow"), issue(3, "Crash!", "")],
    );
    expect(seen).toEqual(["app crash app crash on start", "settings page settings page slow", "crash crash"]);
    expect(result.map((m) => [m.id, m.similarity])).toEqual([
      [3, 1],
      [2, 0.6],
    ]);
  });

  test("propagates embedding failures as EmbeddingBackendError", async () => {
    const client: EmbeddingClient = {
      model: "fake-embedding",
      embedBatch: async () => {
        throw Object.assign(new Error("Unauthorized"), { statusCode: 401 });
      },
    };
    const finder = createDuplicateFinder({ useEmbeddings: true }, { logger, embeddingClient: client });
    await expect(
      finder.findSimilarIssues(target, reactCandidates),
    ).rejects.toBeInstanceOf(EmbeddingBackendError);
  });
});

describe("checkExactDuplicate", () => {
  test("returns the first candidate with the same title", () => {
    const finder = createDuplicateFinder({ useEmbeddings: false }, { logger });
    const candidates = [issue(2, "Bug: App crashes on startup"), issue(3, "Different issue")];
    expect(
      finder.checkExactDuplicate({ id: 1, title: "Bug: App crashes on startup" }, candidates),
    ).toBe(candidates[0]);
  });
});
