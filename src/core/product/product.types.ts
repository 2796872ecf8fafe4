export type RawProduct = Record<string, unknown>;

/** One entry of a batch artifact. */
export type ProductRecord = {
  id: string | number | null;
  name: string | null;
  url_key: string | null;
  price: number | null;
  description: string;
  image_url: string | null;
};
