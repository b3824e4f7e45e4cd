import { z } from "zod";
import type { NewErrorReport, NewPrediction } from "../db/schema";

const WebUrl = z.string().url();

export const PredictionDTO = z
    .object({
        webUrl: WebUrl,
        // null = not classified yet, or skipped because scraping failed
        isGamblingSite: z.boolean().nullable(),
        scrapingTime: z.coerce.date(),
        isError: z.boolean(),
    })
    .refine((p) => !p.isError || p.isGamblingSite === null, {
        message: "an errored prediction cannot carry a classification",
        path: ["isGamblingSite"],
    });


export const ErrorReportDTO = z.object({
    webUrl: WebUrl,
    description: z.string().min(1),
});


// ground truth: the label is always known
export const DatasetEntryDTO = z.object({
    webUrl: WebUrl,
    scrapingTime: z.coerce.date(),
    isGamblingSite: z.boolean(),
});


/** What a scraper hands over once a URL is done, successfully or not. */
export const ScrapingReportDTO = z.object({
    webUrl: WebUrl,
    isGamblingSite: z.boolean().nullable().optional(),
    isError: z.boolean(),
    scrapingInitiationTime: z.coerce.date(),
    exceptionRaised: z.string().nullable().optional(),
});


export const UNKNOWN_ERROR = "Unknown error";

export function toStoreRows(input: unknown): {
    prediction: NewPrediction;
    errorReport: NewErrorReport | null;
} {
    const report = ScrapingReportDTO.parse(input);

    const prediction = PredictionDTO.parse({
        webUrl: report.webUrl,
        isGamblingSite: report.isError ? null : report.isGamblingSite ?? null,
        scrapingTime: report.scrapingInitiationTime,
        isError: report.isError,
    });

    const errorReport = report.isError
        ? ErrorReportDTO.parse({
            webUrl: report.webUrl,
            description: report.exceptionRaised?.trim() || UNKNOWN_ERROR,
        })
        : null;

    return { prediction, errorReport };
}
