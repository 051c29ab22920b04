import { describe, expect, it } from "vitest";
import { listingPage } from "./__fixtures__/fake-remote";
import { isNavigationLink, parseListing } from "./listing-parser";

describe("parseListing", () => {
  it("returns every anchor in document order with a directory flag", () => {
    const links = parseListing(listingPage(["Sub%20Dir/", "file.bin"]));

    expect(links).toEqual([
      { href: "?C=N;O=D", isDirectory: false },
      { href: "?C=S;O=A", isDirectory: false },
      { href: "../", isDirectory: true },
      { href: "Sub%20Dir/", isDirectory: true },
      { href: "file.bin", isDirectory: false },
    ]);
  });

  it("ignores anchors without an href", () => {
    expect(parseListing(`<a name="top">top</a><a href="">empty</a><a href=" x.zip ">x</a>`)).toEqual([
      { href: "x.zip", isDirectory: false },
    ]);
  });
});

describe("isNavigationLink", () => {
  it.each(["../", "./", "/", "index.html", "index.htm", "?C=M;O=A", "#top", "mailto:admin@example.org"])(
    "treats %s as navigation",
    (href) => {
      expect(isNavigationLink(href)).toBe(true);
    },
  );

  it.each(["file.bin", "Sub/", "../Other/", "/files/abs.zip"])("keeps %s", (href) => {
    expect(isNavigationLink(href)).toBe(false);
  });
});
