declare const brandKey: unique symbol;
type Brand<B> = {[brandKey]: B};
export type Branded<T, B> = T & Brand<B>;

/**
 * The canonical flat representation of a grid: a row-major list of each
 * location, with either the numeral in the location or a period meaning the
 * location is empty.  Always 81 characters long.
 */
export type GridString = Branded<string, 'Grid'>;
