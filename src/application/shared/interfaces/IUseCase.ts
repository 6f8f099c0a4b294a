/**
 * A single application operation behind one HTTP route
 *
 * Requests are plain objects already validated by the presentation layer.
 */
export interface IUseCase<TRequest, TResponse> {
  execute(request: TRequest): Promise<TResponse>;
}
