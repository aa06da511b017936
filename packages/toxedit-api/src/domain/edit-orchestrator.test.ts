import type { EditGenerationContext, EditGenerator, FormPayloadExtractor } from "@toxedit/contracts";
import { describe, expect, it, vi } from "vitest";
import { InMemoryRecordStore } from "../storage/in-memory-record-store.js";
import { EditOrchestrator } from "./edit-orchestrator.js";
import type { EditLogger } from "./logger.js";
import { createBlankRecord } from "./record-fields.js";

const THREAD_ID = "thread_test";

function untilAborted(context: EditGenerationContext): Promise<unknown> {
  return new Promise((_resolve, reject) => {
    context.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

function setup(options: { generationTimeoutMs?: number } = {}) {
  const store = new InMemoryRecordStore();
  const generator = {
    generatePatch: vi.fn<EditGenerator["generatePatch"]>(async () => {
      throw new Error("patch generation not expected");
    }),
    generateFullUpdate: vi.fn<EditGenerator["generateFullUpdate"]>(async () => {
      throw new Error("full update not expected");
    }),
    classifyAmbiguous: vi.fn<EditGenerator["classifyAmbiguous"]>(async () => "NO_EDIT"),
  };
  const extractor = {
    extract: vi.fn<FormPayloadExtractor["extract"]>(async () => ({})),
  };
  const logger: EditLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const orchestrator = new EditOrchestrator({
    store,
    generator,
    extractor,
    logger,
    generationTimeoutMs: options.generationTimeoutMs,
    createThreadId: () => THREAD_ID,
  });

  return { store, generator, extractor, logger, orchestrator };
}

describe("EditOrchestrator natural-language path", () => {
  it("applies a generated patch on top of the current version", async () => {
    const { store, generator, orchestrator } = setup();
    store.save({ threadId: THREAD_ID, record: { inci: "L-MENTHOL", NOAEL: [] }, summary: "seed" });
    generator.generatePatch.mockResolvedValue([
      { op: "add", path: "/NOAEL/-", value: { value: 200, unit: "mg/kg bw/day", source: "OECD" } },
    ]);

    const response = await orchestrator.edit({
      ingredientId: "L-MENTHOL",
      threadId: THREAD_ID,
      instruction: "Add a NOAEL of 200 mg/kg bw/day from OECD",
    });

    expect(response).toMatchObject({
      threadId: THREAD_ID,
      version: 2,
      pathTaken: "NLI_EDIT",
      fallbackUsed: false,
      summary: "Applied patch: add /NOAEL/-",
    });
    expect(response.record.NOAEL).toEqual([{ value: 200, unit: "mg/kg bw/day", source: "oecd", type: "NOAEL" }]);
    expect(response.patchOps).toHaveLength(1);
    expect(generator.generatePatch.mock.calls[0]?.[0]).toMatchObject({
      ingredientId: "L-MENTHOL",
      record: { inci: "L-MENTHOL", NOAEL: [] },
    });
    expect(generator.generateFullUpdate).not.toHaveBeenCalled();
  });

  it("falls back to a full update when the patch does not apply", async () => {
    const { generator, logger, orchestrator } = setup();
    generator.generatePatch.mockResolvedValue([{ op: "remove", path: "/NOAEL/5" }]);
    generator.generateFullUpdate.mockResolvedValue({ noael: { value: 300, source: "ECHA" } });

    const response = await orchestrator.edit({ ingredientId: "CITRAL", instruction: "Set the NOAEL to 300" });

    expect(response).toMatchObject({
      version: 1,
      pathTaken: "NLI_EDIT",
      fallbackUsed: true,
      summary: "Fallback full update: NOAEL",
    });
    expect(response.record.NOAEL).toEqual([{ value: 300, unit: "mg/kg bw/day", source: "echa", type: "NOAEL" }]);
    expect(response.patchOps).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith(
      expect.stringMatching(
        /^\[toxedit-api\] patch path failed, falling back to full update: operation 0: OPERATION_PATH_UNRESOLVABLE: /,
      ),
    );
  });

  it("falls back once when patch generation times out", async () => {
    const { generator, orchestrator } = setup({ generationTimeoutMs: 20 });
    generator.generatePatch.mockImplementation(untilAborted);
    generator.generateFullUpdate.mockResolvedValue({ DAP: 10 });

    const response = await orchestrator.edit({ ingredientId: "CITRAL", instruction: "Change the DAP to 10" });

    expect(response.fallbackUsed).toBe(true);
    expect(response.record.DAP).toEqual([{ value: 10, unit: "%", source: "", type: "DAP" }]);
    expect(generator.generateFullUpdate).toHaveBeenCalledTimes(1);
  });

  it("fails with a timeout when the fallback also times out", async () => {
    const { store, generator, orchestrator } = setup({ generationTimeoutMs: 10 });
    generator.generatePatch.mockImplementation(untilAborted);
    generator.generateFullUpdate.mockImplementation(untilAborted);

    await expect(orchestrator.edit({ ingredientId: "CITRAL", instruction: "Change the DAP to 10" })).rejects.toMatchObject({
      code: "GENERATION_TIMEOUT",
      path: "NLI_EDIT",
      message: "full update generation did not finish within 10ms on the NLI_EDIT path",
    });
    expect(store.current(THREAD_ID)).toBeNull();
  });

  it("rejects patches that reference unknown fields without falling back", async () => {
    const { store, generator, orchestrator } = setup();
    generator.generatePatch.mockResolvedValue([{ op: "add", path: "/reviewer_notes", value: "x" }]);

    await expect(orchestrator.edit({ ingredientId: "CITRAL", instruction: "Add a note to the category" })).rejects.toMatchObject({
      code: "UNKNOWN_FIELD_REFERENCE",
      message: "patch rejected on the NLI_EDIT path: operation 0: unknown field referenced: reviewer_notes",
    });
    expect(generator.generateFullUpdate).not.toHaveBeenCalled();
    expect(store.current(THREAD_ID)).toBeNull();
  });

  it("rejects fallback output that is not an object of field updates", async () => {
    const { generator, orchestrator } = setup();
    generator.generatePatch.mockResolvedValue("not a patch");
    generator.generateFullUpdate.mockResolvedValue(["NOAEL"]);

    await expect(orchestrator.edit({ ingredientId: "CITRAL", instruction: "Set the NOAEL to 3" })).rejects.toMatchObject({
      code: "MALFORMED_FALLBACK_OUTPUT",
      message: "full update on the NLI_EDIT path did not return a JSON object of field updates",
    });
  });

  it("rejects fallback output that breaks the record", async () => {
    const { generator, orchestrator } = setup();
    generator.generatePatch.mockResolvedValue([]);
    generator.generateFullUpdate.mockResolvedValue({ inci: 5 });

    await expect(orchestrator.edit({ ingredientId: "CITRAL", instruction: "Set the inci to 5" })).rejects.toMatchObject({
      code: "MALFORMED_FALLBACK_OUTPUT",
    });
  });

  it("saves nothing when the caller cancels during generation", async () => {
    const { store, generator, orchestrator } = setup();
    const controller = new AbortController();
    generator.generatePatch.mockImplementation(async () => {
      controller.abort();
      return [{ op: "add", path: "/DAP/-", value: 1 }];
    });

    await expect(
      orchestrator.edit({ ingredientId: "CITRAL", instruction: "Set the DAP to 1", signal: controller.signal }),
    ).rejects.toMatchObject({ code: "EDIT_CANCELLED", path: "NLI_EDIT" });
    expect(store.current(THREAD_ID)).toBeNull();
  });
});

describe("EditOrchestrator form paths", () => {
  it("applies a structured payload without calling the generator", async () => {
    const { generator, extractor, logger, orchestrator } = setup();

    const response = await orchestrator.edit({
      ingredientId: "CITRAL",
      structuredPayload: { noael: { value: 50, unit: "mg/kg", experiment_target: "Rat", study_duration: "90 days" } },
    });

    expect(response).toMatchObject({
      threadId: THREAD_ID,
      version: 1,
      pathTaken: "FORM_EDIT_STRUCTURED",
      fallbackUsed: false,
      summary: "Structured update: NOAEL",
    });
    expect(response.record.repeated_dose_toxicity?.[0]?.data).toEqual([
      "NOAEL of 50 mg/kg established in Rat (90 days study)",
    ]);
    expect(generator.generatePatch).not.toHaveBeenCalled();
    expect(generator.classifyAmbiguous).not.toHaveBeenCalled();
    expect(extractor.extract).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith("[toxedit-api] thread_test v1 FORM_EDIT_STRUCTURED");
  });

  it("extracts payloads from a pasted correction form", async () => {
    const { extractor, orchestrator } = setup();
    const form = "NOAEL: 50 mg/kg\nSpecies: Rat\nDuration: 90 days";
    extractor.extract.mockResolvedValue({
      NOAEL: { value: 50, unit: "mg/kg", experiment_target: "Rat", study_duration: "90 days" },
    });

    const response = await orchestrator.edit({ ingredientId: "CITRAL", instruction: form });

    expect(response).toMatchObject({ pathTaken: "FORM_EDIT_RAW", summary: "Correction form update: NOAEL" });
    expect(response.record.NOAEL?.[0]).toMatchObject({ value: 50, unit: "mg/kg", experiment_target: "Rat" });
    expect(extractor.extract.mock.calls[0]?.[0]).toBe(form);
  });

  it("records an unchanged version when extraction finds nothing", async () => {
    const { orchestrator } = setup();

    const response = await orchestrator.edit({ ingredientId: "CITRAL", instruction: "NOAEL: 50\nSpecies: Rat" });

    expect(response.summary).toBe("No structured data extracted from correction form; record unchanged");
    expect(response.record).toEqual(createBlankRecord("CITRAL"));
  });

  it("folds a full update into form evidence whose source differs only in case", async () => {
    const { generator, orchestrator } = setup();
    await orchestrator.edit({
      ingredientId: "CITRAL",
      structuredPayload: { noael: { value: 50, source: "OECD", reference_title: "90-day study" } },
    });
    generator.generatePatch.mockResolvedValue([{ op: "remove", path: "/NOAEL/9" }]);
    generator.generateFullUpdate.mockResolvedValue({
      repeated_dose_toxicity: [{ source: "OECD", reference: { title: "90-day study" }, data: ["revised"] }],
    });

    const response = await orchestrator.edit({
      ingredientId: "CITRAL",
      threadId: THREAD_ID,
      instruction: "Update the repeated dose toxicity study data",
    });

    expect(response).toMatchObject({ version: 2, fallbackUsed: true });
    expect(response.record.repeated_dose_toxicity).toEqual([
      {
        reference: { title: "90-day study" },
        data: ["revised"],
        source: "oecd",
        statement: "Based on oecd assessment",
        replaced: { replaced_inci: "", replaced_type: "" },
      },
    ]);
  });

  it("starts a new thread from the supplied initial record", async () => {
    const { orchestrator } = setup();

    const response = await orchestrator.edit({
      ingredientId: "CITRAL",
      instruction: "What is the DAP?",
      initialRecord: { inci: "CITRAL", category: "FRAGRANCE" },
    });

    expect(response).toMatchObject({
      version: 1,
      pathTaken: "NO_EDIT",
      summary: "No edit requested; record unchanged",
      record: { inci: "CITRAL", category: "FRAGRANCE" },
    });
  });
});

describe("EditOrchestrator versioning", () => {
  it("keeps the record identical across no-op edits", async () => {
    const { store, orchestrator } = setup();
    store.save({ threadId: THREAD_ID, record: { inci: "CITRAL", DAP: [] }, summary: "seed" });

    const first = await orchestrator.edit({ ingredientId: "CITRAL", threadId: THREAD_ID, instruction: "Is this ok?" });
    const second = await orchestrator.edit({ ingredientId: "CITRAL", threadId: THREAD_ID, instruction: "Is this ok?" });

    expect([first.version, second.version]).toEqual([2, 3]);
    expect(second.record).toEqual({ inci: "CITRAL", DAP: [] });
    expect(store.diff(THREAD_ID, 1, 3)).toEqual([]);
  });

  it("serializes concurrent edits on one thread", async () => {
    const { store, orchestrator } = setup();

    const [first, second] = await Promise.all([
      orchestrator.edit({ ingredientId: "CITRAL", structuredPayload: { noael: { value: 1 } } }),
      orchestrator.edit({ ingredientId: "CITRAL", structuredPayload: { dap: { value: 2 } } }),
    ]);

    expect([first.version, second.version]).toEqual([1, 2]);
    expect(second.record.NOAEL?.[0]?.value).toBe(1);
    expect(second.record.DAP?.[0]?.value).toBe(2);
    expect(store.history(THREAD_ID)?.map((entry) => entry.version)).toEqual([1, 2]);
  });

  it("reports store failures", async () => {
    const { store, orchestrator } = setup();
    vi.spyOn(store, "save").mockImplementation(() => {
      throw new Error("disk full");
    });

    await expect(
      orchestrator.edit({ ingredientId: "CITRAL", structuredPayload: { dap: { value: 2 } } }),
    ).rejects.toMatchObject({
      code: "STORE_WRITE_FAILURE",
      path: "FORM_EDIT_STRUCTURED",
      message: "could not save FORM_EDIT_STRUCTURED result for thread thread_test: disk full",
    });
  });
});

describe("EditOrchestrator evidence entries", () => {
  const entry = {
    data: ["No phototoxic response"],
    source: "SCCS",
    reference_title: "SCCS/1459/11",
  };

  it("creates the evidence list when the record lacks it", async () => {
    const { store, orchestrator } = setup();
    store.save({ threadId: THREAD_ID, record: { inci: "CITRAL" }, summary: "seed" });

    const response = await orchestrator.addEvidenceEntry({
      ingredientId: "CITRAL",
      threadId: THREAD_ID,
      field: "phototoxicity",
      entry,
    });

    expect(response).toMatchObject({ version: 2, summary: "Added phototoxicity entry" });
    expect(response.patchOps?.map((operation) => [operation.op, operation.path])).toEqual([["add", "/phototoxicity"]]);
    expect(response.record.phototoxicity).toEqual([
      {
        reference: { title: "SCCS/1459/11", link: null },
        data: ["No phototoxic response"],
        source: "sccs",
        statement: "Based on sccs assessment",
        replaced: { replaced_inci: "", replaced_type: "" },
      },
    ]);
  });

  it("returns null when removing from a thread that does not exist", async () => {
    const { store, orchestrator } = setup();

    await expect(
      orchestrator.removeEvidenceEntry({ threadId: "thread_missing", field: "phototoxicity", index: 0 }),
    ).resolves.toBeNull();
    expect(store.current("thread_missing")).toBeNull();
  });

  it("rejects removing an index past the end without saving", async () => {
    const { store, orchestrator } = setup();
    store.save({ threadId: THREAD_ID, record: { inci: "CITRAL", phototoxicity: [] }, summary: "seed" });

    await expect(
      orchestrator.removeEvidenceEntry({ threadId: THREAD_ID, field: "phototoxicity", index: 2 }),
    ).rejects.toMatchObject({ code: "PATCH_VALIDATION_FAILED", path: "FORM_EDIT_STRUCTURED" });
    expect(store.current(THREAD_ID)?.version).toBe(1);
  });
});

describe("EditOrchestrator extraction preview", () => {
  it("returns extracted payloads and saves nothing", async () => {
    const { store, extractor, orchestrator } = setup();
    extractor.extract.mockResolvedValue({ DAP: { value: 1, unit: "%" } });

    await expect(orchestrator.previewExtraction("DAP: 1 %")).resolves.toEqual({ DAP: { value: 1, unit: "%" } });
    expect(extractor.extract.mock.calls[0]?.[0]).toBe("DAP: 1 %");
    expect(store.current(THREAD_ID)).toBeNull();
  });

  it("times out on the raw form path", async () => {
    const { extractor, orchestrator } = setup({ generationTimeoutMs: 10 });
    extractor.extract.mockImplementation(
      (_text, signal) =>
        new Promise((_resolve, reject) => {
          signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
        }),
    );

    await expect(orchestrator.previewExtraction("NOAEL: 5")).rejects.toMatchObject({
      code: "GENERATION_TIMEOUT",
      path: "FORM_EDIT_RAW",
    });
  });
});
