import { describe, it, expect } from "vitest";
import { scoreImage, selectKeyImages } from "@/lib/case-study/image-selector";
import { makeImage } from "./helpers/fixtures";

describe("scoreImage", () => {
    it("prefers earlier images", () => {
        const image = makeImage({ caption: "Image" });
        expect(scoreImage(image, 0, "")).toBe(50);
        expect(scoreImage(image, 10, "")).toBe(45);
        expect(scoreImage(image, 150, "")).toBe(0);
    });

    it("rewards images from the first slides or pages", () => {
        expect(scoreImage(makeImage({ caption: "Image from Slide 1" }), 0, "")).toBe(150);
        expect(scoreImage(makeImage({ caption: "Page 2" }), 0, "")).toBe(130);
        expect(scoreImage(makeImage({ caption: "Image from slide 4" }), 0, "")).toBe(110);
    });

    it("rewards caption words that appear in the narrative", () => {
        const image = makeImage({ caption: "Migration dashboard screenshot" });
        expect(scoreImage(image, 0, "the migration dashboard shows progress")).toBe(70);
    });

    it("rewards informative captions and penalises decorative ones", () => {
        expect(scoreImage(makeImage({ caption: "Revenue chart" }), 0, "")).toBe(100);
        expect(scoreImage(makeImage({ caption: "Background image from Intro" }), 0, "")).toBe(0);
    });
});

describe("selectKeyImages", () => {
    it("returns up to three images unchanged and in order", () => {
        const images = [makeImage({ id: "a" }), makeImage({ id: "b" }), makeImage({ id: "c" })];
        const selected = selectKeyImages(images, {});

        expect(selected.map((image) => image.id)).toEqual(["a", "b", "c"]);
        expect(selected).not.toBe(images);
    });

    it("ranks a diagram into the top three", () => {
        const images = [
            makeImage({ id: "a", caption: "Image 1" }),
            makeImage({ id: "b", caption: "Image 2" }),
            makeImage({ id: "c", caption: "Image 3" }),
            makeImage({ id: "d", caption: "Process diagram" }),
        ];

        expect(selectKeyImages(images, {}).map((image) => image.id)).toEqual(["d", "a", "b"]);
    });

    it("honours a custom limit", () => {
        const images = ["a", "b", "c", "d"].map((id) => makeImage({ id }));
        expect(selectKeyImages(images, {}, 2).map((image) => image.id)).toEqual(["a", "b"]);
    });
});
