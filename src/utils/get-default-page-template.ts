const BUTTON_CLASSES =
  "bg-green-500 hover:bg-green-600 text-white font-bold py-2 px-4 rounded";

/**
 * Generate default page template
 * Wraps a rendered post with the site shell and prev/next navigation
 */
export function getDefaultPageTemplate(): string {
  return `<!DOCTYPE html>
<html lang="{{lang}}">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>{{title}}</title>
{{#if description}}
    <meta name="description" content="{{description}}">
{{/if}}
    <link rel="stylesheet" href="{{stylesheet}}">
{{#if cdn}}
    <script src="https://cdn.tailwindcss.com"></script>
{{/if}}
</head>
<body class="bg-gray-800 text-white">
    <div class="container mx-auto px-4 py-8">
        <div class="flex justify-between items-center mb-6">
            {{#if navigation.prev}}<a href="{{navigation.prev.href}}" title="{{navigation.prev.title}}" class="${BUTTON_CLASSES}"><span>&larr; Back</span></a>{{/if}}
            <h1 class="text-3xl font-bold">{{title}}</h1>
            {{#if navigation.next}}<a href="{{navigation.next.href}}" title="{{navigation.next.title}}" class="${BUTTON_CLASSES}"><span>Next &rarr;</span></a>{{/if}}
        </div>
        <p class="text-gray-500 text-sm mb-6"><time datetime="{{date}}">{{date}}</time>{{#if navigation.index}} &middot; <a href="{{navigation.index}}" class="text-green-400 hover:underline">{{site}}</a>{{/if}}</p>
        <article>
{{{content}}}
        </article>
    </div>
</body>
</html>
`;
}
