/**
 * @fileoverview ITokenProvider Interface
 * @module services/interfaces/ITokenProvider
 * 
 * Source of the per-session authenticity token sent with every submission.
 */

export interface ITokenProvider {
    /**
     * Current token, or null when the session has none
     */
    getToken(): string | null;
}
