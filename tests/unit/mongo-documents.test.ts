import { ObjectId } from "mongodb";
import { describe, expect, it } from "vitest";
import {
  documentToAudit,
  documentToReading,
  documentToUser,
  parseAuditAction,
  readingToDocument,
  storedTimestampToIso,
  timestampSinceFilter,
  userUpdateToSet,
} from "../../src/infrastructure/database/mongo/documents.js";

const id = new ObjectId("65f4a0c2e4b0a1b2c3d4e5f6");

describe("reading documents", () => {
  it("stores timestamps as ISO strings and reads them back unchanged", () => {
    const doc = readingToDocument({
      timestamp: "2024-03-15T12:00:00.000Z",
      weightKg: 2.5,
      sensorId: "bin-1",
      temperature: 21,
      humidity: 40,
      location: "entrada",
      source: "thingspeak",
      externalTimestamp: "2024-03-15T11:59:00Z",
    });
    expect(doc.timestamp).toBe("2024-03-15T12:00:00.000Z");
    expect(doc.fonte).toBe("thingspeak");

    expect(documentToReading({ ...doc, _id: id })).toEqual({
      id: "65f4a0c2e4b0a1b2c3d4e5f6",
      timestamp: "2024-03-15T12:00:00.000Z",
      weightKg: 2.5,
      sensorId: "bin-1",
      temperature: 21,
      humidity: 40,
      location: "entrada",
      source: "thingspeak",
      externalTimestamp: "2024-03-15T11:59:00Z",
    });
  });

  it("reads unknown sources as device pushes", () => {
    const reading = documentToReading({
      _id: id,
      timestamp: new Date("2024-03-15T12:00:00.000Z"),
      peso_kg: 1,
      sensor_id: "bin-1",
      temperatura: 0,
      umidade: 0,
      localizacao: "entrada",
      fonte: "manual",
    });
    expect([reading.source, reading.externalTimestamp]).toEqual(["device", null]);
  });

  it("reads offset-less string timestamps as UTC", () => {
    const reading = documentToReading({
      _id: id,
      timestamp: "2024-03-15T12:00:00.123456",
      peso_kg: 1,
      sensor_id: "bin-1",
      temperatura: 0,
      umidade: 0,
      localizacao: "entrada",
      fonte: "esp32",
    });
    expect(reading.timestamp).toBe("2024-03-15T12:00:00.123Z");
  });

  it("keeps the offset of string timestamps that carry one", () => {
    expect(storedTimestampToIso("2024-03-15T09:30:00-03:00")).toBe("2024-03-15T12:30:00.000Z");
    expect(storedTimestampToIso(new Date("2024-03-15T12:30:00Z"))).toBe(
      "2024-03-15T12:30:00.000Z",
    );
  });

  it("filters windows across date and string timestamps", () => {
    expect(timestampSinceFilter("2024-03-08T12:00:00.000Z")).toEqual({
      $or: [
        { timestamp: { $gte: new Date("2024-03-08T12:00:00.000Z") } },
        { timestamp: { $type: "string", $gte: "2024-03-08T12:00:00.000" } },
      ],
    });
  });
});

describe("user documents", () => {
  it("defaults two-factor fields on older accounts", () => {
    const user = documentToUser({
      username: "ana",
      hash_senha: "aa",
      salt: "bb",
      nome: "Ana",
      role: "supervisor",
      email: null,
      criado_em: "2024-01-01T00:00:00.000Z",
      ultimo_login: null,
      ativo: true,
    });
    expect([user.role, user.mfaEnabled, user.mfaSecret]).toEqual(["usuario", false, null]);
  });

  it("builds a $set body from defined fields only", () => {
    expect(userUpdateToSet({ name: "Ana", email: null, active: undefined })).toEqual({
      nome: "Ana",
      email: null,
    });
  });
});

describe("audit documents", () => {
  it("maps legacy action names", () => {
    expect(parseAuditAction("LOGIN")).toBe("LOGIN");
    expect(parseAuditAction("MFA_ATIVADO")).toBe("MFA_ACTIVATED");
    expect(parseAuditAction("MFA_ATIVACAO")).toBe("MFA_ACTIVATION_FAILED");
    expect(parseAuditAction("SOMETHING_ELSE")).toBeNull();
  });

  it("skips documents with unknown actions", () => {
    const base = {
      _id: id,
      timestamp: "2024-03-15T12:00:00.000Z",
      usuario: "ana",
      descricao: "x",
      status: "erro" as const,
      dados_senseis: false,
    };
    expect(documentToAudit({ ...base, acao: "UNKNOWN" })).toBeNull();
    expect(documentToAudit({ ...base, acao: "MFA_ATIVADO" })).toMatchObject({
      action: "MFA_ACTIVATED",
      status: "error",
    });
  });
});
