/** Calendar range of ISO dates (`YYYY-MM-DD`), start inclusive, end exclusive. */
export interface DateRange {
  start: string;
  end: string;
}
