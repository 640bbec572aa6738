import { describe, expect, it } from "vitest";
import { VectorizerNotFittedError } from "./errors";
import { englishStopWords } from "./stopwords";
import { TfidfVectorizer, idf, l2Norm } from "./vectorizer";

function vectorizer(sublinearTf = false) {
  return new TfidfVectorizer({
    maxFeatures: 10,
    stopWords: englishStopWords(),
    ngramRange: [1, 1],
    sublinearTf,
  });
}

/** Weight of `term` in `v`, looked up through the fitted vocabulary. */
function weight(v: TfidfVectorizer, vec: ReadonlyMap<number, number>, term: string): number {
  const id = v.vocabulary.idOf(term);
  return id === undefined ? 0 : (vec.get(id) ?? 0);
}

describe("idf", () => {
  it("uses the smoothed formula", () => {
    expect(idf(2, 2)).toBe(1);
    expect(idf(2, 1)).toBeCloseTo(Math.log(1.5) + 1, 12);
  });

  it("is strictly positive and decreasing in df", () => {
    expect(idf(10, 10)).toBeGreaterThan(0);
    expect(idf(10, 3)).toBeGreaterThan(idf(10, 4));
  });
});

describe("TfidfVectorizer", () => {
  it("weights rarer terms higher and normalizes to unit length", () => {
    const v = vectorizer();
    const [catDog, dogBird] = v.fitTransform(["cat dog", "dog bird"]);

    expect(weight(v, catDog, "cat")).toBeCloseTo(0.8148024747, 9);
    expect(weight(v, catDog, "dog")).toBeCloseTo(0.5797386715, 9);
    expect(weight(v, dogBird, "bird")).toBeCloseTo(0.8148024747, 9);
    expect(l2Norm(catDog)).toBeCloseTo(1, 9);
    expect(l2Norm(dogBird)).toBeCloseTo(1, 9);
  });

  it("gives the idf of a shared term below that of a unique term", () => {
    const v = vectorizer().fit(["cat dog", "dog bird"]);
    const vocab = v.vocabulary;
    const dogIdf = idf(vocab.documentCount, vocab.documentFrequency(vocab.idOf("dog") ?? -1));
    const catIdf = idf(vocab.documentCount, vocab.documentFrequency(vocab.idOf("cat") ?? -1));
    expect(dogIdf).toBeLessThan(catIdf);
  });

  it("uses raw counts unless sublinear tf is enabled", () => {
    const raw = vectorizer(false);
    raw.fit(["cat dog", "dog bird"]);
    const r = raw.transform("dog dog cat");
    expect(weight(raw, r, "dog")).toBeCloseTo(0.8181802074, 9);
    expect(weight(raw, r, "cat")).toBeCloseTo(0.5749618668, 9);

    const sub = vectorizer(true);
    sub.fit(["cat dog", "dog bird"]);
    const s = sub.transform("dog dog cat");
    expect(weight(sub, s, "dog")).toBeCloseTo(0.7694470730, 9);
    expect(weight(sub, s, "cat")).toBeCloseTo(0.6387105776, 9);
  });

  it("returns an empty vector for out-of-vocabulary text", () => {
    const v = vectorizer().fit(["cat dog", "dog bird"]);
    expect(v.transform("zebra giraffe").size).toBe(0);
    expect(v.transform("").size).toBe(0);
  });

  it("never weights stop words", () => {
    const v = vectorizer().fit(["the dog", "the cat"]);
    const vec = v.transform("the the the dog");
    expect(vec.size).toBe(1);
    expect(weight(v, vec, "dog")).toBeCloseTo(1, 12);
  });

  it("does not change the vocabulary on transform", () => {
    const v = vectorizer().fit(["cat dog"]);
    v.transform("bird fish");
    expect(v.vocabulary.terms()).toEqual(["cat", "dog"]);
    expect(v.vocabulary.documentCount).toBe(1);
  });

  it("is deterministic", () => {
    const a = vectorizer().fitTransform(["alpha beta beta", "beta gamma"]);
    const b = vectorizer().fitTransform(["alpha beta beta", "beta gamma"]);
    expect(a).toEqual(b);
  });

  it("refuses to transform before fit", () => {
    const v = vectorizer();
    expect(v.isFitted()).toBe(false);
    expect(() => v.transform("dog")).toThrow(VectorizerNotFittedError);
  });
});
