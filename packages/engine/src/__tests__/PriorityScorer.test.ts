/**
 * @fileoverview Unit tests for PriorityScorer
 *
 * Tests cover:
 * - Each signal of the default weight table
 * - Caps and tiers
 * - Clamping of the total
 * - Missing timestamp and reactions
 *
 * @module @triage/engine/__tests__/PriorityScorer
 */

import { describe, it, expect } from "vitest";
import { loadDefaultTriageConfig } from "../config/loadConfig.js";
import type { CategoryDefinition } from "../contracts/CategoryDefinition.js";
import { PriorityScorer } from "../scoring/PriorityScorer.js";
import { normalizeText } from "../text/normalize.js";

const kNOW = new Date("2025-03-03T12:00:00.000Z");

function hoursAgo(hours: number): Date {
    return new Date(kNOW.getTime() - hours * 60 * 60 * 1000);
}

describe("PriorityScorer", () => {
    const config = loadDefaultTriageConfig();
    const scorer = new PriorityScorer(config.priority, () => kNOW);

    function categoryNamed(name: string): CategoryDefinition | undefined {
        return config.categories.find((category) => category.name === name);
    }

    // Scenario: A message with no signals scores zero
    it("should score zero when no signal applies", () => {
        expect(scorer.score({ text: "lunch plans for friday", timestamp: hoursAgo(48) }, undefined)).toBe(0);
    });

    // Scenario: Category boost comes from the definition
    it("should add the category boost", () => {
        const breakdown = scorer.explain({ text: "thanks" }, categoryNamed("access_request"));

        expect(breakdown.categoryBoost).toBe(0.4);
        expect(breakdown.total).toBe(0.4);
    });

    // Scenario: Several urgent terms still add the bonus once
    it("should apply the urgency bonus once", () => {
        expect(scorer.explain({ text: "critical outage urgent" }, undefined).urgency).toBe(0.2);
        expect(scorer.explain({ text: "all calm" }, undefined).urgency).toBe(0);
    });

    // Scenario: Configured terms with capitals or punctuation still match normalized text
    it("should normalize urgent terms", () => {
        const custom = new PriorityScorer({ ...config.priority, urgentTerms: ["On-Call", "ASAP"] }, () => kNOW);

        expect(custom.explain({ text: normalizeText("Paging the on-call engineer") }, undefined).urgency).toBe(0.2);
        expect(custom.explain({ text: normalizeText("Fix this ASAP") }, undefined).urgency).toBe(0.2);
        expect(custom.explain({ text: normalizeText("call me later") }, undefined).urgency).toBe(0);
    });

    // Scenario: Question and exclamation marks are capped
    it("should cap punctuation signals", () => {
        expect(scorer.explain({ text: "why?" }, undefined).questions).toBeCloseTo(0.1, 10);
        expect(scorer.explain({ text: "why? why? why? why?" }, undefined).questions).toBe(0.3);
        expect(scorer.explain({ text: "hey!!" }, undefined).exclamations).toBeCloseTo(0.1, 10);
        expect(scorer.explain({ text: "hey!!!!!!" }, undefined).exclamations).toBe(0.2);
    });

    // Scenario: Only the highest length tier applies
    it("should apply one length tier", () => {
        expect(scorer.explain({ text: "a".repeat(100) }, undefined).length).toBe(0);
        expect(scorer.explain({ text: "a".repeat(101) }, undefined).length).toBe(0.1);
        expect(scorer.explain({ text: "a".repeat(250) }, undefined).length).toBe(0.2);
    });

    // Scenario: Younger messages get larger recency bonuses
    it("should apply the tightest recency tier", () => {
        expect(scorer.explain({ text: "x", timestamp: hoursAgo(0.5) }, undefined).recency).toBe(0.15);
        expect(scorer.explain({ text: "x", timestamp: hoursAgo(3) }, undefined).recency).toBe(0.1);
        expect(scorer.explain({ text: "x", timestamp: hoursAgo(12) }, undefined).recency).toBe(0.05);
        expect(scorer.explain({ text: "x", timestamp: hoursAgo(30) }, undefined).recency).toBe(0);
    });

    // Scenario: Missing or invalid timestamp contributes nothing
    it("should ignore missing and invalid timestamps", () => {
        expect(scorer.explain({ text: "x" }, undefined).recency).toBe(0);
        expect(scorer.explain({ text: "x", timestamp: new Date(Number.NaN) }, undefined).recency).toBe(0);
    });

    // Scenario: Reactions count from two on and are capped
    it("should score reactions from the minimum count", () => {
        expect(scorer.explain({ text: "x", reactions: ["eyes"] }, undefined).reactions).toBe(0);
        expect(scorer.explain({ text: "x", reactions: ["eyes", "+1"] }, undefined).reactions).toBe(0.1);
        expect(scorer.explain({ text: "x", reactions: Array.from({ length: 10 }, () => "+1") }, undefined).reactions).toBe(0.2);
        expect(scorer.explain({ text: "x" }, undefined).reactions).toBe(0);
    });

    // Scenario: Signals add up
    it("should sum independent signals", () => {
        const total = scorer.score({
            text     : "can someone check the build?",
            timestamp: hoursAgo(3),
            reactions: ["eyes", "+1"],
        }, categoryNamed("question"));

        // 0.1 boost + 0.1 question + 0.1 recency + 0.1 reactions
        expect(total).toBeCloseTo(0.4, 10);
    });

    // Scenario: Everything at once is clamped to 1
    it("should clamp the total to 1", () => {
        const breakdown = scorer.explain({
            text     : normalizeText("production is down, URGENT!!! please help asap"),
            timestamp: hoursAgo(0.5),
        }, categoryNamed("urgent"));

        expect(breakdown.categoryBoost).toBe(0.8);
        expect(breakdown.urgency).toBe(0.2);
        expect(breakdown.exclamations).toBeCloseTo(0.15, 10);
        expect(breakdown.recency).toBe(0.15);
        expect(breakdown.total).toBe(1);
    });

    // Scenario: Score stays in range for assorted inputs
    it("should keep scores within [0, 1]", () => {
        const texts = ["", "?", "!!!!!!!!!!!!!!!!", "urgent ".repeat(50), "fyi the wiki moved"];

        for (const text of texts) {
            for (const category of config.categories) {
                const score = scorer.score({ text, timestamp: hoursAgo(0.1), reactions: ["a", "b", "c"] }, category);
                expect(score).toBeGreaterThanOrEqual(0);
                expect(score).toBeLessThanOrEqual(1);
            }
        }
    });
});
