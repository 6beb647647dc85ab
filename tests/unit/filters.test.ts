/**
 * Unit tests for the query predicates
 */

import { describe, it, expect } from "vitest";
import {
    DISCOUNT_BRACKETS,
    categoryPredicate,
    discountBracketPredicate,
    filterProducts,
    findBracket,
    objectivePredicate,
    parseDiscount,
    searchPredicate,
    type DiscountBracket,
} from "../../src/lib/queries/filters";

function bracket(id: string): DiscountBracket {
    const found = findBracket(id);
    if (!found) throw new Error(`no bracket ${id}`);
    return found;
}

function bracketsFor(discount: unknown): string[] {
    return DISCOUNT_BRACKETS
        .filter((b) => discountBracketPredicate(b)({ Descuento: discount }))
        .map((b) => b.id);
}

describe("parseDiscount", () => {
    it("should read plain numbers and percentages", () => {
        expect(parseDiscount("35")).toBe(35);
        expect(parseDiscount("35%")).toBe(35);
        expect(parseDiscount(20)).toBe(20);
    });

    it("should accept a decimal comma", () => {
        expect(parseDiscount("12,5 %")).toBe(12.5);
    });

    it("should return null for anything else", () => {
        expect(parseDiscount("mucho")).toBeNull();
        expect(parseDiscount("%")).toBeNull();
        expect(parseDiscount("0x10")).toBeNull();
        expect(parseDiscount("1e1")).toBeNull();
        expect(parseDiscount("0b101")).toBeNull();
        expect(parseDiscount(null)).toBeNull();
    });
});

describe("discount brackets", () => {
    it("should place a value in exactly one bracket, lower bound inclusive", () => {
        expect(bracketsFor("0")).toEqual(["0-10"]);
        expect(bracketsFor("10")).toEqual(["10-20"]);
        expect(bracketsFor("30")).toEqual(["30-50"]);
        expect(bracketsFor("49.9")).toEqual(["30-50"]);
    });

    it("should put 50% and above in the open bracket", () => {
        expect(bracketsFor("50%")).toEqual(["50+"]);
        expect(bracketsFor(85)).toEqual(["50+"]);
    });

    it("should match nothing when the discount is unreadable", () => {
        expect(bracketsFor("n/a")).toEqual([]);
        expect(bracketsFor("0x10")).toEqual([]);
        expect(bracketsFor(null)).toEqual([]);
    });

    it("should find brackets by id", () => {
        expect(bracket("50+")).toEqual({ id: "50+", label: "Más del 50%", min: 50, max: null });
        expect(findBracket("60-70")).toBeUndefined();
    });
});

describe("searchPredicate", () => {
    const match = searchPredicate("WHEY");

    it("should match any descriptive field regardless of case", () => {
        expect(match({ Nombre: "Whey Isolate" })).toBe(true);
        expect(match({ Nombre: "Batido", Descripcion: "Proteína whey de suero" })).toBe(true);
        expect(match({ Nombre: "Creatina", Categoria: "Whey" })).toBe(true);
    });

    it("should not look at other columns", () => {
        expect(match({ Nombre: "Creatina", Imagen: "https://cdn.example.com/whey.png" })).toBe(false);
    });
});

describe("taxonomy predicates", () => {
    it("should compare normalized values", () => {
        expect(categoryPredicate("5")({ Categoria: 5 })).toBe(true);
        expect(categoryPredicate("Proteínas")({ Categoria: "Creatina" })).toBe(false);
        expect(objectivePredicate("Fuerza")({ Objetivo: " Fuerza " })).toBe(true);
    });
});

describe("filterProducts", () => {
    it("should keep feed order", () => {
        const snapshot = [
            { ID: "1", Categoria: "A" },
            { ID: "2", Categoria: "B" },
            { ID: "3", Categoria: "A" },
        ];

        expect(filterProducts(snapshot, categoryPredicate("A"))).toEqual([snapshot[0], snapshot[2]]);
    });
});
