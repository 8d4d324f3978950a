/**
 * Interface for layout engines that turn a diagram model into absolute
 * grid positions
 */
export interface ILayoutEngine<TModel, TLayout> {
  /**
   * Calculate positions for every element of a model
   * @param maxWidth Optional output budget in columns; engines throw a
   *   `LayoutError` when the model cannot be made to fit
   */
  layout(model: TModel, maxWidth?: number): TLayout;
}

/**
 * Interface for renderers that draw a laid-out diagram onto a character grid
 */
export interface IRenderer<TLayout> {
  /** Draw the layout and return the grid as text, one line per row */
  render(layout: TLayout): string;
}
