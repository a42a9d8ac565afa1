/** Result envelope of the adapter tools; failures are reported, not thrown. */
export type ToolResponse<TData> =
  | { success: true; data: TData; message: string }
  | { success: false; data: null; error: string; message: string };

export function toolFailure(error: string, message: string): ToolResponse<never> {
  return { success: false, data: null, error, message };
}
