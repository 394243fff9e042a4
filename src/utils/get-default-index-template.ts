/**
 * Generate default index template
 * Lists every post, newest first
 */
export function getDefaultIndexTemplate(): string {
  return `<!DOCTYPE html>
<html lang="{{lang}}">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>{{title}}</title>
    <link rel="stylesheet" href="{{stylesheet}}">
{{#if cdn}}
    <script src="https://cdn.tailwindcss.com"></script>
{{/if}}
</head>
<body class="bg-gray-800 text-white">
    <div class="container mx-auto px-4 py-8">
        <h1 class="text-3xl font-bold mb-6">{{title}}</h1>
        <ul class="space-y-4">
{{#each posts}}
            <li>
                <a href="{{this.href}}" class="text-2xl font-bold text-green-400 hover:underline">{{this.title}}</a>
                <p class="text-gray-500 text-sm"><time datetime="{{this.date}}">{{this.date}}</time></p>
{{#if this.description}}
                <p class="text-gray-400">{{this.description}}</p>
{{/if}}
            </li>
{{/each}}
        </ul>
    </div>
</body>
</html>
`;
}
