/**
 * Built-in default templates
 * These are used when no user templates are provided
 */

/**
 * C# source file
 * Declarations arrive pre-rendered; the template only arranges them
 */
export const DEFAULT_SOURCE_TEMPLATE = `// Image: {{image}}
{{#each attributes}}
{{this}}
{{/each}}
{{#each declarations}}

{{this}}
{{/each}}
`;

/**
 * SDK-style project for one assembly
 */
export const DEFAULT_PROJECT_TEMPLATE = `<Project Sdk="Microsoft.NET.Sdk">

  <PropertyGroup>
    <TargetFramework>netstandard2.0</TargetFramework>
    <AssemblyName>{{xml name}}</AssemblyName>
    <ProjectGuid>{{guid}}</ProjectGuid>
    <GenerateAssemblyInfo>false</GenerateAssemblyInfo>
    <NoWarn>CS0108;CS0109;CS0114;CS0162;CS0414;CS0649;CS0693</NoWarn>
  </PropertyGroup>

  <ItemGroup>
{{#each references}}
    <Reference Include="{{xml name}}">
      <HintPath>{{xml path}}</HintPath>
    </Reference>
{{/each}}
  </ItemGroup>

</Project>
`;

/**
 * Visual Studio solution referencing every generated project
 */
export const DEFAULT_SOLUTION_TEMPLATE = `Microsoft Visual Studio Solution File, Format Version 12.00
# Visual Studio Version 16
{{#each projects}}
Project("{9A19103F-16F7-4668-BE54-9A1E7A4F7556}") = "{{name}}", "{{path}}", "{{guid}}"
EndProject
{{/each}}
Global
	GlobalSection(SolutionConfigurationPlatforms) = preSolution
		Debug|Any CPU = Debug|Any CPU
		Release|Any CPU = Release|Any CPU
	EndGlobalSection
	GlobalSection(ProjectConfigurationPlatforms) = postSolution
{{#each projects}}
		{{guid}}.Debug|Any CPU.ActiveCfg = Debug|Any CPU
		{{guid}}.Debug|Any CPU.Build.0 = Debug|Any CPU
		{{guid}}.Release|Any CPU.ActiveCfg = Release|Any CPU
		{{guid}}.Release|Any CPU.Build.0 = Release|Any CPU
{{/each}}
	EndGlobalSection
EndGlobal
`;

/**
 * IDA Python script naming every method with a known address
 */
export const DEFAULT_SCRIPT_TEMPLATE = `# Generated by il2cpp-dump
# Image: {{image}}
import idc

def set_name(addr, name):
    ret = idc.set_name(addr, name, idc.SN_NOWARN | idc.SN_NOCHECK)
    if ret == 0:
        idc.set_name(addr, name + '_' + hex(addr), idc.SN_NOWARN | idc.SN_NOCHECK)

print('Naming {{methods.length}} methods...')
{{#each methods}}
set_name({{hex address}}, '{{name}}')
{{/each}}
print('Script finished!')
`;
