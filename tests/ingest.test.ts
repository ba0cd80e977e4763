import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import { htmlToPlainText, mapRowsToProducts, readCatalogFile } from "../src/pipeline/ingest.js";

describe("ingest", () => {
  it("folds Shopify variant rows into one product per handle", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "catalog-csv-"));
    const filePath = path.join(dir, "catalog.csv");

    await writeFile(
      filePath,
      [
        "Handle,Title,Body (HTML),Vendor,Type,Tags,Variant SKU",
        "cbd-gummies-1000mg,,,,,,SKU-1",
        'cbd-gummies-1000mg,CBD Gummies 1000mg,"<p>Full spectrum gummies.</p><p>See the <a href=""https://example.com/lab"">lab report</a>.</p>",Leafy,CBD,"cbd, gummies",',
        ",Strawberry Ice 50ml Shortfill,,Cloudco,,,SKU-3",
        ",,,,,,SKU-4",
      ].join("\n"),
      "utf8",
    );

    const catalog = await readCatalogFile(filePath);

    expect(catalog.columns).toEqual(["Handle", "Title", "Body (HTML)", "Vendor", "Type", "Tags", "Variant SKU"]);
    expect(catalog.products).toHaveLength(2);

    const [gummies, shortfill] = catalog.products;
    expect(gummies).toMatchObject({
      handle: "cbd-gummies-1000mg",
      title: "CBD Gummies 1000mg",
      body: "Full spectrum gummies. See the lab report.",
      vendor: "Leafy",
      existingType: "CBD",
      existingTags: "cbd, gummies",
    });
    expect(gummies.source["Variant SKU"]).toBe("SKU-1");

    expect(shortfill.handle).toBe("strawberry-ice-50ml-shortfill");
    expect(shortfill.vendor).toBe("Cloudco");
  });

  it("reads XLSX sheets through column aliases", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "catalog-xlsx-"));
    const filePath = path.join(dir, "catalog.xlsx");

    const data = [
      { product_title: "Mesh Coil Five Pack", brand: "Coilco", description: "Replacement mesh coils" },
      { product_title: "Nic Salt Liquid 10ml", brand: "Saltco", description: "" },
    ];

    const worksheet = XLSX.utils.json_to_sheet(data);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, worksheet, "Sheet1");
    XLSX.writeFile(workbook, filePath);

    const catalog = await readCatalogFile(filePath);

    expect(catalog.columns).toEqual(["product_title", "brand", "description"]);
    expect(catalog.products.map((product) => [product.handle, product.title, product.vendor, product.body])).toEqual([
      ["mesh-coil-five-pack", "Mesh Coil Five Pack", "Coilco", "Replacement mesh coils"],
      ["nic-salt-liquid-10ml", "Nic Salt Liquid 10ml", "Saltco", ""],
    ]);
  });

  it("requires a handle or title column", () => {
    expect(() => mapRowsToProducts([{ Price: "9.99" }], ["Price"])).toThrow(
      "Input file must include a Handle or a Title column (or an alias).",
    );
  });

  it("rejects unsupported file types", async () => {
    await expect(readCatalogFile("/tmp/catalog.json")).rejects.toThrow(
      "Unsupported input format: .json. Use .csv or .xlsx.",
    );
  });

  it("flattens HTML descriptions to a single line", () => {
    expect(htmlToPlainText('<div>Mesh coil</div><div>0.15 ohm</div><img src="coil.png">')).toBe(
      "Mesh coil 0.15 ohm",
    );
    expect(htmlToPlainText("")).toBe("");
  });
});
