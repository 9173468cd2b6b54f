/**
 * Per-module user prompt. `{{placeholders}}` are filled by renderTemplate.
 */

export const BUILD_MODULE_TEMPLATE = `Module to generate: {{generated_module}}
Spec module: {{spec_module}}
Expected exported names: {{expected_names}}

## Spec stubs
{{spec_sources}}

## Guidance
{{spec_prompts}}

## Dependency APIs
{{dependency_apis}}

## Generated dependency modules
{{dependency_modules}}

## Shared guidance
{{shared_guidance}}

## Errors from previous attempts (fix all of them)
{{error_context}}
`;
