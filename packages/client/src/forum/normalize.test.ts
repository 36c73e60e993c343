import { MalformedResponseError } from "@talkback/shared";
import { describe, expect, it } from "vitest";
import {
  flattenPostingTree,
  normalizeForumPosting,
  parseForumTimestamp,
  type RawForumNode,
} from "./normalize";

const URL_UNDER_TEST = "https://forum.example.test/graphql/v1/";

function node(
  id: string,
  rootPostingId: string,
  replies: RawForumNode[] = [],
  overrides: Partial<RawForumNode> = {},
): RawForumNode {
  return {
    id,
    lifecycleStatus: "Published",
    author: { id: `author-${id}`, name: `Author ${id}` },
    title: null,
    text: `Body ${id}`,
    reactions: {
      aggregated: [
        { name: "positive", value: 4 },
        { name: "negative", value: 1 },
      ],
    },
    history: { created: "2023-05-04T08:30:00Z" },
    rootPostingId,
    replies,
    ...overrides,
  };
}

describe("flattenPostingTree", () => {
  it("walks the tree in pre-order", () => {
    const tree = [
      node("a", "a", [node("a1", "a", [node("a1x", "a")]), node("a2", "a")]),
      node("b", "b", [node("b1", "b")]),
    ];

    expect(flattenPostingTree(tree).map((n) => n.id)).toEqual(["a", "a1", "a1x", "a2", "b", "b1"]);
  });

  it("returns one entry per node", () => {
    const tree = [node("r", "r", [node("c1", "r"), node("c2", "r", [node("c3", "r")])])];

    expect(flattenPostingTree(tree)).toHaveLength(4);
  });

  it("treats absent or null replies as leaves", () => {
    const tree: RawForumNode[] = [{ id: "stub" }, { id: "leaf", replies: null }];

    expect(flattenPostingTree(tree).map((n) => n.id)).toEqual(["stub", "leaf"]);
  });

  it("handles an empty forest", () => {
    expect(flattenPostingTree<RawForumNode>([])).toEqual([]);
  });
});

describe("normalizeForumPosting", () => {
  it("maps the root posting to a null parent", () => {
    const posting = normalizeForumPosting(node("root", "root"), URL_UNDER_TEST);

    expect(posting).toEqual({
      postingId: "root",
      parentId: null,
      user: { userId: "author-root", name: "Author root" },
      threadId: null,
      published: new Date("2023-05-04T08:30:00.000Z"),
      title: null,
      message: "Body root",
      upvotes: 4,
      downvotes: 1,
    });
  });

  it("points replies at the thread root, not at their direct parent", () => {
    const tree = [node("root", "root", [node("child", "root", [node("grandchild", "root")])])];

    const parents = flattenPostingTree(tree).map(
      (n) => normalizeForumPosting(n, URL_UNDER_TEST).parentId,
    );

    expect(parents).toEqual([null, "root", "root"]);
  });

  it("turns empty title and text into null", () => {
    const posting = normalizeForumPosting(node("x", "x", [], { title: "", text: "" }), URL_UNDER_TEST);

    expect(posting.title).toBeNull();
    expect(posting.message).toBeNull();
  });

  it("rejects a posting with fewer than two reaction aggregates", () => {
    const broken = node("x", "x", [], {
      reactions: { aggregated: [{ name: "positive", value: 1 }] },
    });

    expect(() => normalizeForumPosting(broken, URL_UNDER_TEST)).toThrow(MalformedResponseError);
  });

  it("reports the posting and field that is missing", () => {
    const broken = node("x", "x", [], { author: null });

    try {
      normalizeForumPosting(broken, URL_UNDER_TEST);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedResponseError);
      expect(err).toMatchObject({ path: ["posting", "x", "author"], url: URL_UNDER_TEST });
    }
  });

  it("rejects an unparseable creation timestamp", () => {
    const broken = node("x", "x", [], { history: { created: "not a date" } });

    expect(() => normalizeForumPosting(broken, URL_UNDER_TEST)).toThrow(/Invalid timestamp/);
  });
});

describe("parseForumTimestamp", () => {
  it("keeps an explicit offset", () => {
    expect(parseForumTimestamp("2023-05-04T10:30:00+02:00")?.toISOString()).toBe(
      "2023-05-04T08:30:00.000Z",
    );
  });

  it("reads a timestamp without offset as UTC", () => {
    expect(parseForumTimestamp("2023-05-04T10:30:00.123")?.toISOString()).toBe(
      "2023-05-04T10:30:00.123Z",
    );
  });

  it("accepts offsets given in hours only or without a colon", () => {
    expect(parseForumTimestamp("2023-05-04T10:30:00+01")?.toISOString()).toBe(
      "2023-05-04T09:30:00.000Z",
    );
    expect(parseForumTimestamp("2023-05-04T10:30:00.5-0230")?.toISOString()).toBe(
      "2023-05-04T13:00:00.500Z",
    );
  });

  it("returns null for garbage", () => {
    expect(parseForumTimestamp("soon")).toBeNull();
  });
});
