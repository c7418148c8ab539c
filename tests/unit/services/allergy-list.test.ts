import { describe, expect, it } from "vitest";
import { AllergyList } from "../../../src/services/allergy-list.js";
import {
  DuplicateAllergenError,
  IndexOutOfRangeError,
} from "../../../src/services/errors.js";
import { allergy, ref } from "../fixtures.js";

const penicillin = allergy({
  allergen: { allergenType: "DRUG", coded: ref("drug-penicillin") },
  reactions: [{ reaction: ref("reaction-rash") }],
});
const peanuts = allergy({
  allergen: { allergenType: "FOOD", coded: ref("food-peanuts") },
});
const latex = allergy({
  allergen: { allergenType: "ENVIRONMENT", coded: ref("env-latex") },
});

describe("AllergyList", () => {
  it("starts empty with UNKNOWN status", () => {
    const list = new AllergyList();
    expect(list.size()).toBe(0);
    expect(list.status).toBe("UNKNOWN");
    expect(list.patientId).toBeUndefined();
  });

  it("reports SEE_LIST once an entry is added", () => {
    const list = new AllergyList();
    list.add(penicillin);
    expect(list.size()).toBe(1);
    expect(list.status).toBe("SEE_LIST");
    expect(list.get(0)).toBe(penicillin);
  });

  it("keeps insertion order", () => {
    const list = new AllergyList();
    list.add(penicillin);
    list.add(peanuts);
    list.add(latex);
    expect(list.toArray()).toEqual([penicillin, peanuts, latex]);
    expect([...list]).toEqual([penicillin, peanuts, latex]);
    expect([...list.entries()].map(([i]) => i)).toEqual([0, 1, 2]);
  });

  describe("remove", () => {
    it("returns the removed entry and shifts the rest", () => {
      const list = new AllergyList();
      list.add(penicillin);
      list.add(peanuts);

      expect(list.remove(0)).toBe(penicillin);
      expect(list.size()).toBe(1);
      expect(list.get(0)).toBe(peanuts);
    });

    it("falls back to UNKNOWN when the last entry goes", () => {
      const list = AllergyList.from([penicillin], { status: "SEE_LIST" });
      list.remove(0);
      expect(list.status).toBe("UNKNOWN");
    });

    it.each([-1, 1, 0.5, Number.NaN])("rejects index %s", (index) => {
      const list = new AllergyList();
      list.add(penicillin);
      expect(() => list.remove(index)).toThrow(IndexOutOfRangeError);
      expect(list.size()).toBe(1);
    });

    it("carries index and size on the error", () => {
      const list = new AllergyList();
      try {
        list.remove(3);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(IndexOutOfRangeError);
        expect(err).toMatchObject({ index: 3, size: 0, code: "index_out_of_range" });
      }
    });
  });

  it("rejects get outside the list", () => {
    const list = new AllergyList();
    expect(() => list.get(0)).toThrow(
      "Index 0 is out of range for an allergy list of size 0"
    );
  });

  describe("replace", () => {
    it("swaps the entry at an index", () => {
      const list = new AllergyList();
      list.add(penicillin);
      const edited = { ...penicillin, comment: "edited" };

      expect(list.replace(0, edited)).toBe(penicillin);
      expect(list.get(0)).toBe(edited);
    });

    it("rejects an allergen already listed elsewhere", () => {
      const list = new AllergyList();
      list.add(penicillin);
      list.add(peanuts);
      expect(() => list.replace(1, { ...peanuts, allergen: penicillin.allergen })).toThrow(
        DuplicateAllergenError
      );
      expect(list.get(1)).toBe(peanuts);
    });
  });

  describe("duplicate allergens", () => {
    it("rejects the same coded allergen twice", () => {
      const list = new AllergyList();
      list.add(penicillin);
      expect(() =>
        list.add(allergy({ allergen: { allergenType: "DRUG", coded: ref("drug-penicillin") } }))
      ).toThrow("Allergy list already contains allergen DRUG:drug-penicillin");
    });

    it("compares free-text allergens case-insensitively", () => {
      const list = new AllergyList();
      list.add(allergy({ allergen: { allergenType: "FOOD", nonCoded: "Kiwi" } }));
      expect(() =>
        list.add(allergy({ allergen: { allergenType: "FOOD", nonCoded: " kiwi " } }))
      ).toThrow(DuplicateAllergenError);
    });

    it("allows different free-text allergens", () => {
      const list = new AllergyList();
      list.add(allergy({ allergen: { allergenType: "FOOD", nonCoded: "Kiwi" } }));
      list.add(allergy({ allergen: { allergenType: "FOOD", nonCoded: "Mango" } }));
      expect(list.size()).toBe(2);
    });

    it("matches bare free text against a saved non-coded allergen", () => {
      const list = AllergyList.from(
        [
          allergy({
            id: "allergy-1",
            allergen: { allergenType: "ENVIRONMENT", coded: ref("other"), nonCoded: "Latex" },
          }),
        ],
        { otherNonCodedUuid: "other" }
      );

      expect(() =>
        list.add(allergy({ allergen: { allergenType: "ENVIRONMENT", nonCoded: "latex" } }))
      ).toThrow(DuplicateAllergenError);
      expect(list.size()).toBe(1);
    });

    it("ignores free text on a coded allergen", () => {
      const list = new AllergyList();
      list.add(penicillin);
      expect(() =>
        list.add(
          allergy({
            allergen: { allergenType: "DRUG", coded: ref("drug-penicillin"), nonCoded: "pen" },
          })
        )
      ).toThrow(DuplicateAllergenError);
    });

    it("keeps coded and free-text allergens of the same name apart", () => {
      const list = new AllergyList();
      list.add(
        allergy({
          allergen: {
            allergenType: "DRUG",
            coded: { uuid: "drug-penicillin", display: "penicillin" },
          },
        })
      );
      list.add(allergy({ allergen: { allergenType: "DRUG", nonCoded: "penicillin" } }));
      expect(list.size()).toBe(2);
    });

    it("is not applied when loading stored entries", () => {
      const list = AllergyList.from([penicillin, penicillin], { patientId: "patient-1" });
      expect(list.size()).toBe(2);
      expect(list.patientId).toBe("patient-1");
    });
  });

  describe("contains", () => {
    it("matches stored entries by id", () => {
      const stored = { ...penicillin, id: "allergy-1" };
      const list = AllergyList.from([stored]);

      expect(list.contains({ ...stored, comment: "edited" })).toBe(true);
      expect(list.contains({ ...stored, id: "allergy-2" })).toBe(false);
    });

    it("matches unsaved entries by value", () => {
      const list = AllergyList.from([{ ...penicillin, id: "allergy-1" }]);

      expect(list.contains({ ...penicillin })).toBe(true);
      expect(list.contains({ ...penicillin, comment: "different" })).toBe(false);
    });

    it("finds entries by id", () => {
      const stored = { ...peanuts, id: "allergy-9" };
      const list = AllergyList.from([penicillin, stored]);
      expect(list.findById("allergy-9")).toBe(stored);
      expect(list.findById("missing")).toBeUndefined();
    });
  });

  describe("confirmNoKnownAllergies", () => {
    it("sets NO_KNOWN_ALLERGIES on an empty list", () => {
      const list = new AllergyList();
      list.confirmNoKnownAllergies();
      expect(list.status).toBe("NO_KNOWN_ALLERGIES");
    });

    it("is shadowed by entries", () => {
      const list = new AllergyList();
      list.add(penicillin);
      list.confirmNoKnownAllergies();

      expect(list.status).toBe("SEE_LIST");
      expect(list.declaredStatus).toBe("NO_KNOWN_ALLERGIES");

      list.remove(0);
      expect(list.status).toBe("NO_KNOWN_ALLERGIES");
    });

    it("is cleared by adding an entry", () => {
      const list = new AllergyList({ status: "NO_KNOWN_ALLERGIES" });
      list.add(penicillin);
      list.remove(0);
      expect(list.status).toBe("UNKNOWN");
    });
  });

  it("never keeps SEE_LIST as a declared status", () => {
    const list = new AllergyList({ status: "SEE_LIST" });
    expect(list.declaredStatus).toBe("UNKNOWN");
    expect(list.status).toBe("UNKNOWN");
  });
});
