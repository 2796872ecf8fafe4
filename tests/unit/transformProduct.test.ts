import { InvalidProductError, transformProduct } from "../../src/core/product/transformProduct";

describe("transformProduct", () => {
  it("maps catalog fields and converts the description to plain text", () => {
    const record = transformProduct({
      id: 123,
      name: "Phone",
      url_key: "phone-123",
      price: 250000,
      description: "<p>Line 1</p><p>Line 2</p>",
      thumbnail_url: "https://img.example.test/1.jpg",
      extra: true
    });

    expect(record).toEqual({
      id: 123,
      name: "Phone",
      url_key: "phone-123",
      price: 250000,
      description: "Line 1\nLine 2",
      image_url: "https://img.example.test/1.jpg"
    });
  });

  it("uses null for missing fields and an empty description", () => {
    expect(transformProduct({})).toEqual({
      id: null,
      name: null,
      url_key: null,
      price: null,
      description: "",
      image_url: null
    });
  });

  it("decodes entities in the description", () => {
    expect(transformProduct({ description: "<p>&eacute;t&eacute;</p>" }).description).toBe("été");
  });

  it("parses numeric price strings and drops unparseable ones", () => {
    expect(transformProduct({ price: "199.5" }).price).toBe(199.5);
    expect(transformProduct({ price: "abc" }).price).toBeNull();
  });

  it.each([[[]], [null], ["text"], [42]])("rejects non-object payload %p", (payload) => {
    expect(() => transformProduct(payload)).toThrow(InvalidProductError);
    expect(() => transformProduct(payload)).toThrow("Invalid product payload: expected a JSON object");
  });
});
