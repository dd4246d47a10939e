/**
 * A named, ordered collection of style names applied together to a document.
 *
 * Holds names only: it does not keep the referenced styles alive, and removing a style
 * from the registry does not update sets that include it.
 */
export class StyleSet {
  readonly name: string;
  description: string;
  #includedStyles: string[] = [];

  constructor(name: string, description = '', includedStyles: readonly string[] = []) {
    this.name = name;
    this.description = description;
    for (const styleName of includedStyles) this.addStyle(styleName);
  }

  get includedStyles(): readonly string[] {
    return [...this.#includedStyles];
  }

  /** Appends a style name; repeated names are ignored. */
  addStyle(styleName: string): void {
    if (!this.#includedStyles.includes(styleName)) this.#includedStyles.push(styleName);
  }

  removeStyle(styleName: string): boolean {
    const index = this.#includedStyles.indexOf(styleName);
    if (index < 0) return false;
    this.#includedStyles.splice(index, 1);
    return true;
  }

  hasStyle(styleName: string): boolean {
    return this.#includedStyles.includes(styleName);
  }

  get size(): number {
    return this.#includedStyles.length;
  }
}
