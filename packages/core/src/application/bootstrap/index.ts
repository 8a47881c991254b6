/**
 * @fileoverview Application Bootstrap Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/application/bootstrap
 * @license Apache-2.0
 */

export { createApplication, type Application, type ApplicationSetup } from './create-application';
