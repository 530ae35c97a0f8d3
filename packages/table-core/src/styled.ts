export type Styles = Record<string, string>;

export const DEFAULT_NATURE = "body";

/**
 * Base of every styled entity (table, row/column view, cell).
 *
 * Each entity owns its style map: assigning `styles` stores a shallow copy, so two
 * cells never share the same object.
 */
export class Styled {
  /** Distinguishes body cells from header/footer ones ("body", "header", "footer", ...). */
  nature: string;
  private ownStyles: Styles;

  constructor(styles?: Readonly<Styles> | null, nature: string = DEFAULT_NATURE) {
    this.ownStyles = { ...styles };
    this.nature = nature;
  }

  get styles(): Styles {
    return this.ownStyles;
  }

  set styles(styles: Readonly<Styles> | null | undefined) {
    this.ownStyles = { ...styles };
  }
}
